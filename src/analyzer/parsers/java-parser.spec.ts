import { describe, it, expect } from 'vitest';
import { JavaParser } from './java-parser.js';
import { ParserError } from '../../utils/errors.js';

const CALCULATOR = [
    'public class Calculator {',
    '    public int add(int a, int b) {',
    '        return a + b;',
    '    }',
    '',
    '    private static int helper(int n) {',
    '        int sum = 0;',
    '        for (int i = 0; i < n; i++) {',
    '            for (int j = 0; j < n; j++) {',
    '                if (i > j && j > 0) {',
    '                    sum += i;',
    '                }',
    '            }',
    '        }',
    '        return sum;',
    '    }',
    '',
    '    public static void main(String[] args) {',
    '        Calculator calc = new Calculator();',
    '        int unused = 3;',
    '        int total = helper(4);',
    '        System.out.println(calc.add(1, 2) + total);',
    '    }',
    '}',
    '',
].join('\n');

describe('JavaParser', () => {
    const parser = new JavaParser();

    it('extracts methods with spans, complexity and loop depth', () => {
        const extraction = parser.extract(CALCULATOR);
        expect(extraction.functions).toEqual([
            { name: 'add', startLine: 2, endLine: 4, cyclomaticComplexity: 1, maxLoopDepth: 0 },
            { name: 'helper', startLine: 6, endLine: 16, cyclomaticComplexity: 5, maxLoopDepth: 2 },
            { name: 'main', startLine: 18, endLine: 23, cyclomaticComplexity: 1, maxLoopDepth: 0 },
        ]);
        expect(extraction.loops).toEqual([
            { line: 8, nestingDepth: 1 },
            { line: 9, nestingDepth: 2 },
        ]);
    });

    it('counts bare calls and constructor calls but not calls on other objects', () => {
        const extraction = parser.extract(CALCULATOR);
        expect(extraction.dependencies.get('main')).toEqual(['Calculator', 'helper']);
        expect([...extraction.calledFunctions].sort()).toEqual(['Calculator', 'helper']);
    });

    it('tracks declared and assigned locals against reads', () => {
        const extraction = parser.extract(CALCULATOR);
        expect([...(extraction.assignedVariables ?? [])].sort()).toEqual(['calc', 'i', 'j', 'sum', 'total', 'unused']);
        const unread = [...(extraction.assignedVariables ?? [])].filter(name => !extraction.readVariables?.has(name));
        expect(unread).toEqual(['unused']);
    });

    it('handles constructors, this-calls and lambdas', () => {
        const source = [
            'class Worker {',
            '    Worker() {',
            '        this.start();',
            '    }',
            '',
            '    void start() {',
            '        Runnable r = () -> run();',
            '        r.run();',
            '    }',
            '',
            '    void run() {',
            '        int x = 1;',
            '        x = 2;',
            '    }',
            '}',
            '',
        ].join('\n');
        const extraction = parser.extract(source);
        expect(extraction.functions.map(fn => fn.name)).toEqual(['Worker', 'start', 'run']);
        expect(extraction.dependencies.get('Worker')).toEqual(['start']);
        expect(extraction.dependencies.get('start')).toEqual(['run']);
        expect(extraction.readVariables?.has('x')).toBe(false);
        expect(extraction.readVariables?.has('r')).toBe(true);
    });

    it('counts switch cases but not the default label', () => {
        const source = [
            'class S {',
            '    int pick(int k) {',
            '        switch (k) {',
            '            case 1: return 10;',
            '            case 2: return 20;',
            '            default: return k > 3 ? 1 : 0;',
            '        }',
            '    }',
            '}',
            '',
        ].join('\n');
        const [pick] = parser.extract(source).functions;
        expect(pick.cyclomaticComplexity).toBe(4);
    });

    it('rejects invalid syntax', () => {
        expect(() => parser.extract('class A { void f( { } }')).toThrow(ParserError);
    });
});
