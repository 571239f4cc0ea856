import { Cell } from '../src/cell.js';
import { CoercionError } from '../src/errors.js';
import { baseEnvName, Flag, parseEnvDirective } from '../src/flag.js';
import { StringList } from '../src/string-list.js';

describe('parseEnvDirective', () => {
    test('empty derives from the identifier', () => {
        expect(parseEnvDirective('')).toEqual({ type: 'auto' });
    });

    test('dash suppresses', () => {
        expect(parseEnvDirective('-')).toEqual({ type: 'suppressed' });
    });

    test('other text is an upper-cased explicit name', () => {
        expect(parseEnvDirective('my_int_env')).toEqual({ type: 'explicit', name: 'MY_INT_ENV' });
    });
});

describe('baseEnvName', () => {
    test('derives, uses or drops the name', () => {
        expect(baseEnvName({ type: 'auto' }, 'maxConns')).toBe('MAX_CONNS');
        expect(baseEnvName({ type: 'explicit', name: 'POOL_SIZE' }, 'maxConns')).toBe('POOL_SIZE');
        expect(baseEnvName({ type: 'suppressed' }, 'maxConns')).toBeUndefined();
    });
});

describe('Flag', () => {
    test('writes the default into storage', () => {
        const cell = new Cell(99);
        const flag = new Flag('port', cell, { kind: 'int', value: 8080 }, 'listen port');

        expect(cell.value).toBe(8080);
        expect(flag.value).toBe(8080);
        expect(flag.source).toBe('default');
        expect(flag.isSet()).toBe(false);
    });

    test('set coerces text into storage', () => {
        const cell = new Cell(0);
        const flag = new Flag('timeout', cell, { kind: 'duration', value: 0 }, 'timeout');

        expect(flag.set('2s')).toBe(2000);
        expect(cell.value).toBe(2000);
        expect(flag.toString()).toBe('2s');
    });

    test('set leaves storage alone on bad text', () => {
        const cell = new Cell(false);
        const flag = new Flag('verbose', cell, { kind: 'bool', value: false }, 'verbose');

        expect(() => flag.set('maybe')).toThrow(CoercionError);
        expect(cell.value).toBe(false);
    });

    test('resolveEnvName applies the prefix each time', () => {
        const flag = new Flag('maxConns', new Cell(1), { kind: 'int', value: 1 }, 'max');

        expect(flag.resolvedEnvName).toBeUndefined();
        expect(flag.resolveEnvName('app')).toBe('APP_MAX_CONNS');
        expect(flag.resolveEnvName('')).toBe('MAX_CONNS');
        expect(flag.resolvedEnvName).toBe('MAX_CONNS');
    });

    test('suppressed flags have no env name', () => {
        const flag = new Flag('secret', new Cell(''), { kind: 'string', value: '' }, 'secret', '-');

        expect(flag.suppressed).toBe(true);
        expect(flag.resolveEnvName('app')).toBeUndefined();
    });

    test('tracks the value source', () => {
        const flag = new Flag('name', new Cell(''), { kind: 'string', value: 'x' }, 'name');

        flag.markCommandLine();
        expect(flag.changed).toBe(true);
        expect(flag.source).toBe('cli');

        flag.reset();
        flag.markEnvironment();
        expect(flag.changed).toBe(false);
        expect(flag.source).toBe('env');
        expect(flag.isSet()).toBe(true);
    });

    test('reset writes the default back into storage', () => {
        const port = new Cell(0);
        const flag = new Flag('port', port, { kind: 'int', value: 80 }, 'port');
        flag.set('8080');
        flag.markCommandLine();

        flag.reset();

        expect(port.value).toBe(80);
        expect(flag.source).toBe('default');
    });

    test('materialize splits list storage', () => {
        const list = new StringList();
        const flag = new Flag('tags', list, { kind: 'stringList', value: 'a,b' }, 'tags');

        expect(list.value()).toEqual([]);
        flag.materialize();
        expect(list.value()).toEqual(['a', 'b']);
    });

    test('formatDefault renders the default', () => {
        const flag = new Flag('big', new Cell(0n), { kind: 'uint64', value: 42n }, 'big');
        expect(flag.formatDefault()).toBe('42');
    });
});
