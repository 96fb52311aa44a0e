import { describe, it, expect } from 'vitest';
import { InvalidArgument } from './errors';
import { formatTemplate, uniqueName } from './naming';

describe('formatTemplate()', () => {
    const keys = { bone_name: 'Arm', armature_name: 'RigData', object_name: 'Rig' };

    it('should fill every placeholder', () => {
        expect(formatTemplate('{object_name}:{bone_name}_Copy', keys)).toBe('Rig:Arm_Copy');
        expect(formatTemplate('{bone_name}{bone_name}', keys)).toBe('ArmArm');
    });

    it('should turn doubled braces into literal ones', () => {
        expect(formatTemplate('{{{bone_name}}}', keys)).toBe('{Arm}');
    });

    it('should reject keys the caller did not provide', () => {
        expect(() => formatTemplate('{object}_Local', keys)).toThrow(InvalidArgument);
    });
});

describe('uniqueName()', () => {
    it('should keep a free name', () => {
        expect(uniqueName('Empty', () => false)).toBe('Empty');
    });

    it('should count up from .001', () => {
        const taken = new Set(['Empty', 'Empty.001']);
        expect(uniqueName('Empty', (name) => taken.has(name))).toBe('Empty.002');
    });

    it('should replace an existing numeric suffix instead of stacking one', () => {
        const taken = new Set(['Proxy.001']);
        expect(uniqueName('Proxy.001', (name) => taken.has(name))).toBe('Proxy.002');
    });
});
