// src/analyzer/parsers/extraction-collector.ts
import { ExtractedFunction, LoopRecord, SupportedLanguage, SyntaxExtraction } from '../types.js';

interface FunctionFrame {
    record: ExtractedFunction;
    /** Loop depth of the enclosing code when the function was entered. */
    entryLoopDepth: number;
}

/**
 * Accumulates what a language visitor finds while it walks a tree.
 * Visitors report structure (functions, loops) with enter/exit pairs and
 * references (calls, assignments, reads) as they meet them; calls are
 * attributed to the innermost open function.
 */
export class ExtractionCollector {
    private readonly functions: ExtractedFunction[] = [];
    private readonly loops: LoopRecord[] = [];
    private readonly frames: FunctionFrame[] = [];
    private readonly dependencies = new Map<string, string[]>();
    private readonly calledFunctions = new Set<string>();
    private readonly assignedVariables = new Set<string>();
    private readonly readVariables = new Set<string>();
    private loopDepth = 0;

    constructor(
        private readonly language: SupportedLanguage,
        private readonly options: { tracksVariables: boolean; approximate: boolean },
    ) {}

    enterFunction(name: string, startLine: number): void {
        // Records are appended on entry so the final list keeps declaration order.
        const record: ExtractedFunction = { name, startLine, endLine: startLine, cyclomaticComplexity: 1, maxLoopDepth: 0 };
        this.functions.push(record);
        this.frames.push({ record, entryLoopDepth: this.loopDepth });
        if (!this.dependencies.has(name)) {
            this.dependencies.set(name, []);
        }
    }

    exitFunction(endLine: number, cyclomaticComplexity: number): void {
        const frame = this.frames.pop();
        if (!frame) {
            throw new Error('exitFunction called without a matching enterFunction');
        }
        frame.record.endLine = Math.max(frame.record.startLine, endLine);
        frame.record.cyclomaticComplexity = Math.max(1, cyclomaticComplexity);
    }

    enterLoop(line: number): void {
        this.loopDepth++;
        this.addLoop(line, this.loopDepth);
    }

    exitLoop(): void {
        this.loopDepth = Math.max(0, this.loopDepth - 1);
    }

    /** Records a loop whose nesting depth was computed by the caller. */
    addLoop(line: number, nestingDepth: number): void {
        this.loops.push({ line, nestingDepth });
        for (const frame of this.frames) {
            const relative = nestingDepth - frame.entryLoopDepth;
            if (relative > frame.record.maxLoopDepth) {
                frame.record.maxLoopDepth = relative;
            }
        }
    }

    recordCall(callee: string): void {
        const current = this.frames[this.frames.length - 1];
        if (current) {
            this.dependencies.get(current.record.name)?.push(callee);
        }
        // Recursion alone does not make a function used.
        if (current?.record.name !== callee) {
            this.calledFunctions.add(callee);
        }
    }

    recordAssignment(name: string): void {
        this.assignedVariables.add(name);
    }

    recordRead(name: string): void {
        this.readVariables.add(name);
    }

    build(): SyntaxExtraction {
        const extraction: SyntaxExtraction = {
            language: this.language,
            approximate: this.options.approximate,
            functions: this.functions.map(fn => ({ ...fn })),
            loops: [...this.loops],
            dependencies: new Map([...this.dependencies].map(([caller, callees]) => [caller, [...callees]])),
            calledFunctions: new Set(this.calledFunctions),
        };
        if (this.options.tracksVariables) {
            extraction.assignedVariables = new Set(this.assignedVariables);
            extraction.readVariables = new Set(this.readVariables);
        }
        return extraction;
    }
}
