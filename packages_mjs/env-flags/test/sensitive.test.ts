import { maskValue, setLogMask } from '../src/sensitive.js';

describe('maskValue', () => {
    afterEach(() => {
        setLogMask(true);
    });

    test('redacts values behind credential-like names', () => {
        setLogMask(true);
        expect(maskValue('API_TOKEN', 'abc')).toBe('[REDACTED]');
        expect(maskValue('DB_PASSWORD', 'hunter')).toBe('[REDACTED]');
    });

    test('redacts credential-shaped values under any name', () => {
        setLogMask(true);
        expect(maskValue('HEADER', 'Bearer test-secret')).toBe('[REDACTED]');
    });

    test('passes ordinary values through', () => {
        setLogMask(true);
        expect(maskValue('PORT', '80')).toBe('80');
    });

    test('does nothing once masking is off', () => {
        setLogMask(false);
        expect(maskValue('API_TOKEN', 'abc')).toBe('abc');
    });
});
