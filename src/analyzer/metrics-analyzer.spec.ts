import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import {
    MetricsAnalyzer,
    computeMaintainabilityIndex,
    efficiencyGrade,
    estimateCyclomaticComplexityFromText,
    isCommentLine,
    splitSourceLines,
    timeComplexityLabel,
} from './metrics-analyzer.js';
import { SyntaxExtraction } from './types.js';

const mockLogger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
} as unknown as winston.Logger;

function extraction(overrides: Partial<SyntaxExtraction> = {}): SyntaxExtraction {
    return {
        language: 'python',
        approximate: false,
        functions: [
            { name: 'main', startLine: 1, endLine: 4, cyclomaticComplexity: 3, maxLoopDepth: 2 },
            { name: 'helper', startLine: 6, endLine: 9, cyclomaticComplexity: 6, maxLoopDepth: 0 },
            { name: 'spare', startLine: 11, endLine: 12, cyclomaticComplexity: 1, maxLoopDepth: 3 },
        ],
        loops: [
            { line: 2, nestingDepth: 1 },
            { line: 3, nestingDepth: 2 },
        ],
        dependencies: new Map([
            ['main', ['helper', 'print']],
            ['helper', []],
            ['spare', []],
        ]),
        calledFunctions: new Set(['helper', 'print']),
        assignedVariables: new Set(['x', 'y', 'z']),
        readVariables: new Set(['x']),
        ...overrides,
    };
}

describe('text metrics', () => {
    it('splits lines on every terminator without a phantom last line', () => {
        expect(splitSourceLines('')).toEqual([]);
        expect(splitSourceLines('a\nb\n')).toEqual(['a', 'b']);
        expect(splitSourceLines('a\r\nb\rc')).toEqual(['a', 'b', 'c']);
        expect(splitSourceLines('a\n\n')).toEqual(['a', '']);
    });

    it('recognises comment lines per language', () => {
        expect(isCommentLine('   # note', 'python')).toBe(true);
        expect(isCommentLine('// note', 'python')).toBe(false);
        expect(isCommentLine('  * middle of a block', 'java')).toBe(true);
        expect(isCommentLine('x = 1 // trailing', 'javascript')).toBe(false);
    });

    it('estimates complexity from decision keywords and operators', () => {
        expect(estimateCyclomaticComplexityFromText('{ return 0; }')).toBe(1);
        expect(estimateCyclomaticComplexityFromText('if (a && b || c) { x = y ? 1 : 2; } else { switch (z) { case 1: break; } }')).toBe(6);
    });

    it('labels time complexity by loop depth', () => {
        expect(timeComplexityLabel(0)).toBe('O(1)');
        expect(timeComplexityLabel(1)).toBe('O(n)');
        expect(timeComplexityLabel(2)).toBe('O(n²)');
        expect(timeComplexityLabel(4)).toBe('O(n^4)');
    });

    it('grades average complexity at inclusive boundaries', () => {
        expect(efficiencyGrade(0)).toBe('A');
        expect(efficiencyGrade(5)).toBe('A');
        expect(efficiencyGrade(5.01)).toBe('B');
        expect(efficiencyGrade(10)).toBe('B');
        expect(efficiencyGrade(15)).toBe('C');
        expect(efficiencyGrade(15.5)).toBe('D');
    });

    it('computes a bounded maintainability index', () => {
        expect(computeMaintainabilityIndex(0, 0, 0)).toBe(100);
        expect(computeMaintainabilityIndex(1, 0, 0)).toBe(100);
        expect(computeMaintainabilityIndex(100, 10, 4)).toBe(73.65);
        expect(computeMaintainabilityIndex(1000, 0, 20)).toBe(31.87);
    });
});

describe('MetricsAnalyzer', () => {
    // 20 lines, one of them a comment
    const source = `${['# header', ...Array.from({ length: 19 }, (_, i) => `x${i} = ${i}`)].join('\n')}\n`;

    it('builds per-function records and time complexity estimates', () => {
        const metrics = new MetricsAnalyzer(mockLogger).aggregate(extraction(), source);
        expect(metrics.functions).toEqual([
            { name: 'main', startLine: 1, endLine: 4, cyclomaticComplexity: 3, sizeLines: 3 },
            { name: 'helper', startLine: 6, endLine: 9, cyclomaticComplexity: 6, sizeLines: 3 },
            { name: 'spare', startLine: 11, endLine: 12, cyclomaticComplexity: 1, sizeLines: 1 },
        ]);
        expect(metrics.timeComplexity).toEqual([
            { functionName: 'main', label: 'O(n²)', line: 1 },
            { functionName: 'helper', label: 'O(1)', line: 6 },
            { functionName: 'spare', label: 'O(n^3)', line: 11 },
        ]);
        expect(metrics.dependencies).toEqual({ main: ['helper', 'print'], helper: [], spare: [] });
    });

    it('reports sorted dead code', () => {
        const metrics = new MetricsAnalyzer(mockLogger).aggregate(extraction(), source);
        expect(metrics.deadCode).toEqual({ unusedFunctions: ['main', 'spare'], unusedVariables: ['y', 'z'] });
    });

    it('drops entry points only when asked, per call or per instance', () => {
        const perCall = new MetricsAnalyzer(mockLogger).aggregate(extraction(), source, { excludeEntryPoints: true });
        expect(perCall.deadCode.unusedFunctions).toEqual(['spare']);

        const analyzer = new MetricsAnalyzer(mockLogger, { excludeEntryPoints: true });
        expect(analyzer.aggregate(extraction(), source).deadCode.unusedFunctions).toEqual(['spare']);
        expect(analyzer.aggregate(extraction(), source, { excludeEntryPoints: false }).deadCode.unusedFunctions)
            .toEqual(['main', 'spare']);
    });

    it('summarizes the file', () => {
        const { summary } = new MetricsAnalyzer(mockLogger).aggregate(extraction(), source);
        expect(summary).toEqual({
            totalLines: 20,
            commentLines: 1,
            commentRatio: 5,
            averageComplexity: 3.33,
            efficiencyGrade: 'A',
            functionCount: 3,
            largestFunction: { name: 'main', sizeLines: 3 },
            loopCount: 2,
            nestedLoops: 1,
            maintainabilityIndex: computeMaintainabilityIndex(20, 5, 3.33),
        });
    });

    it('leaves variables and maintainability out for lexical languages', () => {
        const metrics = new MetricsAnalyzer(mockLogger).aggregate(
            extraction({ language: 'c', approximate: true, assignedVariables: undefined, readVariables: undefined }),
            source,
        );
        expect(metrics.deadCode.unusedVariables).toBeUndefined();
        expect(metrics.summary.maintainabilityIndex).toBeUndefined();
        expect(metrics.summary.commentLines).toBe(0);
    });

    it('handles a file without functions', () => {
        const { summary, deadCode } = new MetricsAnalyzer(mockLogger).aggregate(
            extraction({ functions: [], loops: [], dependencies: new Map(), calledFunctions: new Set() }),
            '',
        );
        expect(summary.totalLines).toBe(0);
        expect(summary.commentRatio).toBe(0);
        expect(summary.averageComplexity).toBe(0);
        expect(summary.largestFunction).toEqual({ name: 'None', sizeLines: 0 });
        expect(summary.maintainabilityIndex).toBe(100);
        expect(deadCode.unusedFunctions).toEqual([]);
    });
});
