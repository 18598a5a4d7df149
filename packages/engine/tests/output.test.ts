import { describe, it, expect, beforeEach } from 'vitest';
import { BufferSink, renderTokens, CR, D, N, C, type OutputToken } from '@/output';
import { AuthoringError } from '@/errors';

describe('renderTokens', () => {
    let sink: BufferSink;
    let reported: AuthoringError[];

    const describeObject = (id: string): string | undefined =>
        id === 'LAMP' ? 'brass lantern' : undefined;

    beforeEach(() => {
        sink = new BufferSink();
        reported = [];
    });

    function render(...tokens: OutputToken[]): string {
        renderTokens(tokens, sink, { describe: describeObject, report: error => reported.push(error) });
        return sink.text;
    }

    it('should render a score line', () => {
        expect(render('Score: ', N, 42, CR)).toBe('Score: 42\n');
        expect(reported).toEqual([]);
    });

    it('should write plain strings verbatim', () => {
        expect(render('You are in a maze ', 'of twisty passages.')).toBe('You are in a maze of twisty passages.');
    });

    it('should describe objects, falling back to the id', () => {
        expect(render('Taken: ', D, 'LAMP', '; ', D, 'SWORD')).toBe('Taken: brass lantern; SWORD');
    });

    it('should write a character from a code or a string', () => {
        expect(render(C, 65, C, 'bcd')).toBe('Ab');
    });

    it('should write whole characters outside the basic plane', () => {
        expect(render(C, '\u{1F600}x', '|', C, 0x1f600)).toBe('\u{1F600}|\u{1F600}');
        expect(reported).toEqual([]);
    });

    it('should report a number that is not a code point to C', () => {
        expect(render(C, 0x110000, 'x', C, 2.5)).toBe('x');
        expect(reported.map(error => error.message)).toEqual([
            'C directive expects a code point, got 1114112',
            'C directive expects a code point, got 2.5'
        ]);
    });

    it('should print numbers in full and accept numeric strings', () => {
        expect(render(N, 3.7, ' ', N, '12', ' ', N, -5, ' ', N, 10n)).toBe('3.7 12 -5 10');
        expect(reported).toEqual([]);
    });

    it('should print other values with their default representation', () => {
        expect(render(true, ' ', 7, ' ', null)).toBe('true 7 null');
    });

    it('should report a directive with no operand and keep rendering', () => {
        expect(render('Your lamp is ', D)).toBe('Your lamp is ');
        expect(reported).toHaveLength(1);
        expect(reported[0]).toBeInstanceOf(AuthoringError);
        expect(reported[0].kind).toBe('malformed-output');
        expect(reported[0].message).toBe('D directive at end of output has no operand');
    });

    it('should report a non-numeric operand to N', () => {
        expect(render('Score: ', N, 'lots', CR)).toBe('Score: \n');
        expect(reported[0].message).toBe('N directive expects a number, got lots');
    });

    it('should not take a directive as the operand of another', () => {
        expect(render('Take ', D, CR, 'x')).toBe('Take \nx');
        expect(render('Score: ', N, CR, 'next')).toBe('Take \nxScore: \nnext');
        expect(reported.map(error => error.message)).toEqual([
            'D directive before CR has no operand',
            'N directive before CR has no operand'
        ]);
    });

    it('should start over once the sink is cleared', () => {
        render('first');
        sink.clear();
        expect(render('second')).toBe('second');
    });

    it('should render into an existing sink without clearing it', () => {
        sink.write('> ');
        expect(render('Ok.', CR)).toBe('> Ok.\n');
    });
});
