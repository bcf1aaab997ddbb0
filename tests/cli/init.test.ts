import { describe, it, expect } from 'vitest';
import { defaultProjectName } from '../../src/cli/commands/init.js';

describe('defaultProjectName', () => {
    it('slugs the directory name', () => {
        expect(defaultProjectName('/home/sam/Order Service')).toBe('order-service');
        expect(defaultProjectName('/work/shop_api')).toBe('shop_api');
    });

    it('trims separators at the ends', () => {
        expect(defaultProjectName('/work/--shop--')).toBe('shop');
    });

    it('falls back when nothing usable remains', () => {
        expect(defaultProjectName('/work/###')).toBe('project');
    });
});
