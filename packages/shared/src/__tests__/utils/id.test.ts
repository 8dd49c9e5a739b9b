import { generateId } from '../../utils/id.js';

describe('generateId', () => {
    it('returns a string', () => {
        const id = generateId();
        expect(typeof id).toBe('string');
    });

    it('returns different values on successive calls', () => {
        const ids = new Set(Array.from({ length: 50 }, () => generateId()));
        expect(ids.size).toBe(50);
    });

    it('returns a 21-character URL-safe string', () => {
        const id = generateId();
        expect(id).toMatch(/^[A-Za-z0-9_-]{21}$/);
    });
});
