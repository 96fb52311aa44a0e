import { UserPreconditionFailed } from '../lib/errors';
import { opLog } from '../lib/logger';
import { reportStore } from '../store/reportStore';
import { CANCELLED, FINISHED, type Operator, type OperatorContext, type OperatorResult } from './types';

/**
 * Poll, fill in defaults and execute. Unavailable operators are cancelled;
 * failed user preconditions become error reports and the operator finishes.
 */
export function runOperator<P>(
    operator: Operator<P>,
    context: OperatorContext,
    props?: Partial<P>
): OperatorResult {
    if (!operator.poll(context)) {
        opLog.debug(`${operator.id} is not available`);
        return CANCELLED;
    }

    const resolved: P = { ...operator.defaults(context), ...(props ?? {}) };
    try {
        const result = operator.execute(context, resolved);
        opLog.debug(`${operator.id}: ${result.status}`);
        return result;
    } catch (error) {
        if (error instanceof UserPreconditionFailed) {
            reportStore.getState().error(error.message, operator.id);
            return FINISHED;
        }
        throw error;
    }
}
