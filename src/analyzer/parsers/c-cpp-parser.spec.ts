import { describe, it, expect } from 'vitest';
import { CCppParser, blankNonCode, findFunctions, scanLoops } from './c-cpp-parser.js';

const C_SAMPLE = [
    '#include <stdio.h>',
    '',
    '/* Sum helper */',
    'int sum(int *values, int n) {',
    '    int total = 0;',
    '    for (int i = 0; i < n; i++) {',
    '        for (int j = 0; j < i; j++) {',
    '            total += values[j];',
    '        }',
    '    }',
    '    return total;',
    '}',
    '',
    'static void unused_helper(void) {',
    '    printf("for (;;) never counted\\n");',
    '}',
    '',
    'int main(void) {',
    '    int data[3] = {1, 2, 3};',
    '    if (sum(data, 3) > 0 && data[0]) {',
    '        printf("ok\\n");',
    '    }',
    '    return 0;',
    '}',
    '',
].join('\n');

function lineOf(text: string, offset: number): number {
    return text.slice(0, offset).split('\n').length;
}

describe('blankNonCode', () => {
    it('blanks comments, literal contents and preprocessor lines', () => {
        expect(blankNonCode('x = 1; // for (;;)')).toBe('x = 1; ' + ' '.repeat(11));
        expect(blankNonCode('s = "a(b)";')).toBe('s = "    ";');
        expect(blankNonCode('#define F(x) x\nint y;')).toBe(' '.repeat(14) + '\nint y;');
    });

    it('keeps newlines inside block comments', () => {
        expect(blankNonCode('a /* 1\n2 */ b')).toBe('a' + ' '.repeat(5) + '\n' + ' '.repeat(5) + 'b');
    });
});

describe('findFunctions', () => {
    it('finds definitions and skips prototypes', () => {
        const code = blankNonCode([
            'std::vector<int> build(int n) {',
            '    std::vector<int> out;',
            '    for (int i = 0; i < n; ++i) out.push_back(i);',
            '    return out;',
            '}',
            '',
            'int Counter::next() {',
            '    return ++value;',
            '}',
            '',
            'int declared(int x);',
            '',
        ].join('\n'));
        const { definitions, prototypeNameOffsets } = findFunctions(code);
        expect(definitions.map(fn => fn.name)).toEqual(['build', 'next']);
        expect(prototypeNameOffsets.map(offset => code.slice(offset, offset + 'declared'.length))).toEqual(['declared']);
    });
});

describe('scanLoops', () => {
    it('tracks braced, single-statement and do-while bodies', () => {
        const code = [
            'void f(int n) {',
            '    do {',
            '        n--;',
            '    } while (n > 0);',
            '    while (n < 3)',
            '        for (int k = 0; k < 2; k++)',
            '            n++;',
            '    for (;;) { break; }',
            '}',
        ].join('\n');
        expect(scanLoops(code).map(loop => [lineOf(code, loop.offset), loop.nestingDepth])).toEqual([
            [2, 1],
            [5, 1],
            [6, 2],
            [8, 1],
        ]);
    });
});

describe('CCppParser', () => {
    it('extracts C functions, loops and calls approximately', () => {
        const extraction = new CCppParser('c').extract(C_SAMPLE);
        expect(extraction.language).toBe('c');
        expect(extraction.approximate).toBe(true);
        expect(extraction.functions).toEqual([
            { name: 'sum', startLine: 4, endLine: 12, cyclomaticComplexity: 3, maxLoopDepth: 2 },
            { name: 'unused_helper', startLine: 14, endLine: 16, cyclomaticComplexity: 1, maxLoopDepth: 0 },
            { name: 'main', startLine: 18, endLine: 24, cyclomaticComplexity: 3, maxLoopDepth: 0 },
        ]);
        expect(extraction.loops).toEqual([
            { line: 6, nestingDepth: 1 },
            { line: 7, nestingDepth: 2 },
        ]);
        expect(Object.fromEntries(extraction.dependencies)).toEqual({
            sum: [],
            unused_helper: ['printf'],
            main: ['sum', 'printf'],
        });
        expect(extraction.assignedVariables).toBeUndefined();
    });

    it('does not count a forward declaration as a use', () => {
        const source = [
            'void helper(void);',
            'int main() {',
            '    return 0;',
            '}',
            'void helper(void) {',
            '    int x = 1;',
            '}',
            '',
        ].join('\n');
        const extraction = new CCppParser('c').extract(source);
        expect(extraction.functions.map(fn => [fn.name, fn.startLine, fn.endLine])).toEqual([
            ['main', 2, 4],
            ['helper', 5, 7],
        ]);
        expect(extraction.calledFunctions.size).toBe(0);
    });

    it('ignores member calls and reports qualified C++ methods by their last segment', () => {
        const source = [
            'int Counter::next() {',
            '    while (value < 10) {',
            '        value++;',
            '    }',
            '    return items.size() + helper(value);',
            '}',
            '',
        ].join('\n');
        const extraction = new CCppParser('cpp').extract(source);
        expect(extraction.functions.map(fn => [fn.name, fn.startLine, fn.endLine, fn.cyclomaticComplexity])).toEqual([
            ['next', 1, 6, 2],
        ]);
        expect(extraction.dependencies.get('next')).toEqual(['helper']);
    });
});
