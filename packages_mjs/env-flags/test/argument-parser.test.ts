import { ArgumentParser } from '../src/argument-parser.js';
import { Cell } from '../src/cell.js';
import { ArgumentParseError } from '../src/errors.js';
import { Flag } from '../src/flag.js';

function captureError(fn: () => unknown): ArgumentParseError {
    try {
        fn();
    } catch (error) {
        if (error instanceof ArgumentParseError) {
            return error;
        }
        throw error;
    }
    throw new Error('expected an ArgumentParseError');
}

describe('ArgumentParser', () => {
    let port: Cell<number>;
    let verbose: Cell<boolean>;
    let name: Cell<string>;
    let helpText: string;
    let parser: ArgumentParser;

    beforeEach(() => {
        port = new Cell(0);
        verbose = new Cell(false);
        name = new Cell('');
        helpText = '';

        parser = new ArgumentParser('test', {
            writeOut: (text) => { helpText += text; },
            writeErr: () => { },
        });
        parser.declare(new Flag('port', port, { kind: 'int', value: 8080 }, 'listen port'));
        parser.declare(new Flag('verbose', verbose, { kind: 'bool', value: false }, 'verbose output'));
        parser.declare(new Flag('name', name, { kind: 'string', value: 'anon' }, 'user name'));
    });

    describe('normalize', () => {
        test('rewrites single-dash long flags', () => {
            expect(parser.normalize(['-port', '80', '-name=x'])).toEqual(['--port', '80', '--name=x']);
        });

        test('gives bare booleans an inline value', () => {
            expect(parser.normalize(['-verbose', 'file.txt'])).toEqual(['--verbose=true', 'file.txt']);
            expect(parser.normalize(['--verbose=false'])).toEqual(['--verbose=false']);
        });

        test('passes a flag value through untouched', () => {
            expect(parser.normalize(['-name', '-verbose'])).toEqual(['--name', '-verbose']);
        });

        test('stops at the terminator', () => {
            expect(parser.normalize(['--', '-port'])).toEqual(['--', '-port']);
        });

        test('rewrites the single-dash help flag', () => {
            expect(parser.normalize(['-help'])).toEqual(['--help']);
            expect(parser.normalize(['-name', '-help'])).toEqual(['--name', '-help']);
        });

        test('leaves unknown tokens alone', () => {
            expect(parser.normalize(['-x', 'plain'])).toEqual(['-x', 'plain']);
        });
    });

    describe('parse', () => {
        test('writes supplied values into storage and reports them', () => {
            const result = parser.parse(['-port', '80', '-verbose', 'rest']);

            expect([...result.supplied].sort()).toEqual(['port', 'verbose']);
            expect(result.args).toEqual(['rest']);
            expect(port.value).toBe(80);
            expect(verbose.value).toBe(true);
            expect(name.value).toBe('anon');
        });

        test('accepts an explicit false for booleans', () => {
            verbose.set(true);
            const result = parser.parse(['-verbose=false']);

            expect(result.supplied.has('verbose')).toBe(true);
            expect(verbose.value).toBe(false);
        });

        test('keeps arguments after the terminator', () => {
            const result = parser.parse(['--name', 'bob', '--', '-port', '9']);

            expect(name.value).toBe('bob');
            expect(port.value).toBe(8080);
            expect(result.args).toEqual(['-port', '9']);
        });

        test('reports invalid values', () => {
            const error = captureError(() => parser.parse(['-port', 'abc']));

            expect(error.code).toBe('commander.invalidArgument');
            expect(error.message).toContain("argument 'abc' is invalid");
            expect(error.helpRequested).toBe(false);
        });

        test('reports unknown flags', () => {
            const error = captureError(() => parser.parse(['--zzzzzz']));

            expect(error.code).toBe('commander.unknownOption');
            expect(error.message).toMatch(/^unknown option '--zzzzzz'/);
        });

        test('reports a missing value', () => {
            const error = captureError(() => parser.parse(['-port']));

            expect(error.code).toBe('commander.optionMissingArgument');
        });

        test('flags help requests', () => {
            const error = captureError(() => parser.parse(['--help']));

            expect(error.helpRequested).toBe(true);
            expect(helpText).toContain('--port <value>');
        });

        test('treats -help as a help request', () => {
            const error = captureError(() => parser.parse(['-help']));

            expect(error.code).toBe('commander.helpDisplayed');
            expect(error.helpRequested).toBe(true);
            expect(helpText).toContain('listen port');
        });
    });

    test('helpInformation lists every flag', () => {
        const help = parser.helpInformation();

        expect(help).toContain('--port <value>');
        expect(help).toContain('--verbose [value]');
        expect(help).toContain('user name');
    });
});
