/**
 * Report Store - user-facing messages from operators
 */

import { createStore } from 'zustand/vanilla';
import { opLog } from '../lib/logger';

export type ReportLevel = 'info' | 'warning' | 'error';

export interface Report {
    id: string;
    level: ReportLevel;
    message: string;
    /** Operator that produced the report, if any */
    source?: string;
}

interface ReportState {
    reports: Report[];

    // Actions
    report: (level: ReportLevel, message: string, source?: string) => string;
    clear: () => void;

    // Convenience methods
    error: (message: string, source?: string) => void;
    warning: (message: string, source?: string) => void;
    info: (message: string, source?: string) => void;
}

let reportId = 0;

export const reportStore = createStore<ReportState>()((set, get) => ({
    reports: [],

    report: (level, message, source) => {
        const id = `report-${++reportId}`;
        set((state) => ({
            reports: [...state.reports, { id, level, message, source }],
        }));

        if (level === 'error') {
            opLog.warn(source ? `${source}: ${message}` : message);
        } else {
            opLog.info(source ? `${source}: ${message}` : message);
        }
        return id;
    },

    clear: () => {
        set({ reports: [] });
    },

    error: (message, source) => {
        get().report('error', message, source);
    },

    warning: (message, source) => {
        get().report('warning', message, source);
    },

    info: (message, source) => {
        get().report('info', message, source);
    },
}));
