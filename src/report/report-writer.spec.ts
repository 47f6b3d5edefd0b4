import { describe, it, expect } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { renderReport, reportFileName, writeReport } from './report-writer.js';
import { AnalysisResult } from '../analyzer/types.js';
import { ReportWriteError } from '../utils/errors.js';

const RESULT: AnalysisResult = {
    language: 'java',
    approximate: false,
    functions: [
        { name: 'process', startLine: 3, endLine: 30, cyclomaticComplexity: 12, sizeLines: 27 },
        { name: 'tiny', startLine: 32, endLine: 33, cyclomaticComplexity: 1, sizeLines: 1 },
    ],
    loops: [{ line: 5, nestingDepth: 1 }],
    timeComplexity: [
        { functionName: 'process', label: 'O(n)', line: 3 },
        { functionName: 'tiny', label: 'O(1)', line: 32 },
    ],
    deadCode: { unusedFunctions: ['tiny'], unusedVariables: [] },
    dependencies: { process: ['tiny'], tiny: [] },
    suggestions: [
        { severity: 'error', text: "Function 'process' has high cyclomatic complexity (12) — consider refactoring." },
    ],
    summary: {
        totalLines: 40,
        commentLines: 2,
        commentRatio: 5,
        averageComplexity: 6.5,
        efficiencyGrade: 'B',
        functionCount: 2,
        largestFunction: { name: 'process', sizeLines: 27 },
        loopCount: 1,
        nestedLoops: 0,
    },
};

describe('renderReport', () => {
    it('renders every section', () => {
        const expected = [
            'Language Detected: Java',
            '',
            'Critical Functions:',
            '  process (line 3): complexity 12, 27 lines',
            '',
            'Function Complexity Graph:',
            `  ${'process'.padEnd(20)} | ${'█'.repeat(12)} 12`,
            `  ${'tiny'.padEnd(20)} | ██ 1`,
            '',
            'Time Complexity Estimation:',
            '  process (line 3): O(n)',
            '  tiny (line 32): O(1)',
            '',
            '--- Analysis Report ---',
            'Maintainability Index: N/A',
            'Comment Lines: 2 (5%)',
            'Average Complexity: 6.5',
            'Total Lines: 40',
            'Number of Functions: 2',
            'Largest Function: process (27 lines)',
            'Efficiency Grade: B',
            'Loops Detected: 1',
            'Nested Loops: 0',
            '',
            'Dead Code:',
            '  Unused Variables: None',
            '  Unused Functions: tiny',
            '',
            'Suggestions:',
            "  [ERROR] Function 'process' has high cyclomatic complexity (12) — consider refactoring.",
            '',
        ].join('\n');
        expect(renderReport(RESULT)).toBe(expected);
    });

    it('marks approximate results and untracked variables', () => {
        const text = renderReport({
            ...RESULT,
            language: 'cpp',
            approximate: true,
            functions: [],
            timeComplexity: [],
            deadCode: { unusedFunctions: [] },
            suggestions: [],
            summary: { ...RESULT.summary, maintainabilityIndex: 88.1 },
        });
        const lines = text.split('\n');
        expect(lines.slice(0, 2)).toEqual(['Language Detected: C++', '(approximate: lexical analysis)']);
        expect(lines).toContain('No critical functions detected.');
        expect(lines).toContain('Maintainability Index: 88.1');
        expect(lines).toContain('  Unused Variables: not tracked');
        expect(lines).toContain('  Unused Functions: None');
        expect(lines.slice(-3)).toEqual(['Suggestions:', '  None', '']);
    });
});

describe('reportFileName', () => {
    it('uses a zero-padded local timestamp', () => {
        expect(reportFileName(new Date(2024, 0, 5, 9, 3, 7))).toBe('analysis_report_2024-01-05_09-03-07.txt');
    });
});

describe('writeReport', () => {
    it('writes the rendered report into the directory', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codescope-report-'));
        try {
            const date = new Date(2024, 11, 31, 23, 59, 58);
            const filePath = await writeReport(RESULT, path.join(dir, 'reports'), date);
            expect(filePath).toBe(path.join(dir, 'reports', 'analysis_report_2024-12-31_23-59-58.txt'));
            expect(await fs.readFile(filePath, 'utf-8')).toBe(renderReport(RESULT));
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });

    it('wraps filesystem failures', async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codescope-report-'));
        try {
            const blocker = path.join(dir, 'not-a-dir');
            await fs.writeFile(blocker, 'x');
            await expect(writeReport(RESULT, path.join(blocker, 'sub'))).rejects.toBeInstanceOf(ReportWriteError);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
