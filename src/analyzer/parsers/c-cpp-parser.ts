// src/analyzer/parsers/c-cpp-parser.ts
import { createContextLogger } from '../../utils/logger.js';
import { estimateCyclomaticComplexityFromText } from '../metrics-analyzer.js';
import { SyntaxExtraction, SyntaxExtractor } from '../types.js';
import { ExtractionCollector } from './extraction-collector.js';

const logger = createContextLogger('CCppParser');

// C/C++ storage class and type modifiers allowed before the return type
const SIGNATURE_PREFIX = String.raw`(?:(?:static|inline|extern|const|constexpr|virtual|unsigned|signed|long|short)\s+)*`;
const RETURN_TYPE = String.raw`(?:void|int|char|float|double|long|short|bool|auto|size_t|unsigned|signed|(?:std::)?string|(?:std::)?vector<[^;{}()]*>)`;
const FUNCTION_NAME = String.raw`((?:[A-Za-z_]\w*::)*~?[A-Za-z_]\w*)`;
const FUNCTION_SIGNATURE = new RegExp(
    String.raw`^[ \t]*${SIGNATURE_PREFIX}${RETURN_TYPE}(?:\s*[*&]+\s*|\s+)${FUNCTION_NAME}\s*\(`,
    'dgm',
);

const LOOP_TOKEN = /\b(?:for|while|do)\b|[{}();]/g;
const CALL_SITE = /\b([A-Za-z_]\w*)\s*\(/g;

/** Words followed by `(` that are not calls. */
const NON_CALL_WORDS = new Set([
    'if', 'for', 'while', 'switch', 'return', 'sizeof', 'catch', 'do', 'else', 'case',
    'new', 'delete', 'throw', 'alignof', 'decltype', 'typeid', 'static_assert', 'defined',
    'noexcept', 'void', 'int', 'char', 'float', 'double', 'long', 'short', 'bool', 'unsigned',
    'signed', 'auto', 'const', 'static_cast', 'dynamic_cast', 'reinterpret_cast', 'const_cast',
]);

export interface LexicalFunction {
    name: string;
    /** Offset of the signature's first character. */
    start: number;
    /** Offset of the name as it would appear at a call site. */
    nameOffset: number;
    bodyStart: number;
    /** Offset of the closing brace, or the end of text when unbalanced. */
    bodyEnd: number;
}

export interface LexicalDeclarations {
    definitions: LexicalFunction[];
    /** Name offsets of prototypes (`int f(void);`), which are not call sites. */
    prototypeNameOffsets: number[];
}

export interface LexicalLoop {
    offset: number;
    nestingDepth: number;
}

/**
 * Replaces comments, string and character literals and preprocessor lines
 * with spaces, keeping every newline so offsets and line numbers still match
 * the original text.
 */
export function blankNonCode(sourceText: string): string {
    const out = sourceText.split('');
    const blank = (from: number, to: number): void => {
        for (let i = from; i < to && i < out.length; i++) {
            if (out[i] !== '\n') out[i] = ' ';
        }
    };

    let i = 0;
    let atLineStart = true;
    while (i < sourceText.length) {
        const ch = sourceText[i];
        const next = sourceText[i + 1];

        if (ch === '\n') {
            atLineStart = true;
            i++;
            continue;
        }
        if (atLineStart && ch === '#') {
            // Preprocessor directive, including backslash continuations
            let end = i;
            while (end < sourceText.length && !(sourceText[end] === '\n' && sourceText[end - 1] !== '\\')) end++;
            blank(i, end);
            i = end;
            continue;
        }
        if (ch !== ' ' && ch !== '\t' && ch !== '\r') {
            atLineStart = false;
        }

        if (ch === '/' && next === '/') {
            const end = sourceText.indexOf('\n', i);
            const stop = end === -1 ? sourceText.length : end;
            blank(i, stop);
            i = stop;
        } else if (ch === '/' && next === '*') {
            const end = sourceText.indexOf('*/', i + 2);
            const stop = end === -1 ? sourceText.length : end + 2;
            blank(i, stop);
            i = stop;
        } else if (ch === '"' || ch === "'") {
            let end = i + 1;
            while (end < sourceText.length && sourceText[end] !== ch && sourceText[end] !== '\n') {
                end += sourceText[end] === '\\' ? 2 : 1;
            }
            // Keep the quotes so `f("x")` still reads as a call with an argument
            blank(i + 1, Math.min(end, sourceText.length));
            // an unterminated literal stops at the newline, which still starts a line
            i = sourceText[end] === ch ? end + 1 : end;
        } else {
            i++;
        }
    }
    return out.join('');
}

function matchingClose(text: string, openIndex: number, open: string, close: string): number {
    let depth = 0;
    for (let i = openIndex; i < text.length; i++) {
        if (text[i] === open) depth++;
        else if (text[i] === close) {
            depth--;
            if (depth === 0) return i;
        }
    }
    return -1;
}

/**
 * Finds function definitions by signature: a known return type, a name and a
 * parameter list followed by a brace-delimited body. Prototypes (`;` after the
 * parameters) are returned apart; signatures inside an earlier body are skipped.
 */
export function findFunctions(code: string): LexicalDeclarations {
    const functions: LexicalFunction[] = [];
    const prototypeNameOffsets: number[] = [];
    let scanFrom = 0;

    for (const match of code.matchAll(FUNCTION_SIGNATURE)) {
        const start = match.index ?? 0;
        const nameSpan = match.indices?.[1];
        if (start < scanFrom || !nameSpan) continue;

        const qualified = match[1];
        const name = qualified.slice(qualified.lastIndexOf(':') + 1);
        if (NON_CALL_WORDS.has(name)) continue;

        const parenOpen = start + match[0].length - 1;
        const parenClose = matchingClose(code, parenOpen, '(', ')');
        if (parenClose === -1) continue;

        const nameOffset = nameSpan[1] - name.length;
        const rest = code.slice(parenClose + 1);
        const terminator = rest.search(/[{;]/);
        if (terminator === -1) continue;
        if (rest[terminator] === ';') {
            prototypeNameOffsets.push(nameOffset);
            continue;
        }

        const bodyStart = parenClose + 1 + terminator;
        const close = matchingClose(code, bodyStart, '{', '}');
        const bodyEnd = close === -1 ? code.length : close;

        functions.push({ name, start, nameOffset, bodyStart, bodyEnd });
        scanFrom = bodyEnd + 1;
    }
    return { definitions: functions, prototypeNameOffsets };
}

interface OpenLoop {
    isDo: boolean;
    /** Brace depth inside a braced body, or the depth of the statement for a single-statement body. */
    braceDepth: number;
    braced: boolean;
}

/**
 * Brace-depth loop scan. A loop body is either a braced block or a single
 * statement ending at the next `;` (or block) at the loop's own depth. The
 * `while (...)` that closes a do-while is not counted as another loop.
 */
export function scanLoops(code: string): LexicalLoop[] {
    const tokens = [...code.matchAll(LOOP_TOKEN)].map(m => ({ text: m[0], offset: m.index ?? 0 }));
    const loops: LexicalLoop[] = [];
    const open: OpenLoop[] = [];
    let braceDepth = 0;
    let expectDoTail = false;
    let i = 0;

    const skipParens = (from: number): number => {
        if (tokens[from]?.text !== '(') return from;
        let depth = 0;
        for (let k = from; k < tokens.length; k++) {
            if (tokens[k].text === '(') depth++;
            else if (tokens[k].text === ')' && --depth === 0) return k + 1;
        }
        return tokens.length;
    };

    const closeSingleStatements = (): void => {
        while (open.length > 0) {
            const top = open[open.length - 1];
            if (top.braced || top.braceDepth !== braceDepth) break;
            open.pop();
            if (top.isDo) expectDoTail = true;
        }
    };

    const openBody = (from: number, isDo: boolean): number => {
        const next = tokens[from]?.text;
        if (next === '{') {
            braceDepth++;
            open.push({ isDo, braceDepth, braced: true });
            return from + 1;
        }
        if (next === ';') {
            // empty body, or a single statement with no loop tokens: it ends here
            closeSingleStatements();
            if (isDo) expectDoTail = true;
            return from + 1;
        }
        open.push({ isDo, braceDepth, braced: false });
        return from;
    };

    while (i < tokens.length) {
        const { text, offset } = tokens[i];

        if (expectDoTail) {
            expectDoTail = false;
            if (text === 'while') {
                i = skipParens(i + 1);
                if (tokens[i]?.text === ';') i++;
                closeSingleStatements();
                continue;
            }
        }

        switch (text) {
            case 'for':
            case 'while':
                loops.push({ offset, nestingDepth: open.length + 1 });
                i = openBody(skipParens(i + 1), false);
                break;
            case 'do':
                loops.push({ offset, nestingDepth: open.length + 1 });
                i = openBody(i + 1, true);
                break;
            case '{':
                braceDepth++;
                i++;
                break;
            case '}': {
                const top = open[open.length - 1];
                if (top && top.braced && top.braceDepth === braceDepth) {
                    open.pop();
                    if (top.isDo) expectDoTail = true;
                }
                braceDepth = Math.max(0, braceDepth - 1);
                if (!expectDoTail) closeSingleStatements();
                i++;
                break;
            }
            case ';':
                closeSingleStatements();
                i++;
                break;
            default:
                i++;
        }
    }
    return loops;
}

function lineIndex(text: string): (offset: number) => number {
    const starts = [0];
    for (let i = 0; i < text.length; i++) {
        if (text[i] === '\n') starts.push(i + 1);
    }
    return (offset: number): number => {
        let lo = 0;
        let hi = starts.length - 1;
        while (lo < hi) {
            const mid = (lo + hi + 1) >> 1;
            if (starts[mid] <= offset) lo = mid;
            else hi = mid - 1;
        }
        return lo + 1;
    };
}

function isMemberAccess(code: string, offset: number): boolean {
    let k = offset - 1;
    while (k >= 0 && /\s/.test(code[k])) k--;
    return code[k] === '.' || (code[k] === '>' && code[k - 1] === '-');
}

type LexicalEvent =
    | { kind: 'loop'; offset: number; nestingDepth: number }
    | { kind: 'call'; offset: number; name: string };

/**
 * Pattern-based extraction for C and C++. There is no syntax tree, so results
 * are approximate and variables are not tracked.
 */
export class CCppParser implements SyntaxExtractor {
    constructor(readonly language: 'c' | 'cpp') {}

    extract(sourceText: string): SyntaxExtraction {
        const code = blankNonCode(sourceText);
        const lineAt = lineIndex(code);
        const { definitions: functions, prototypeNameOffsets } = findFunctions(code);
        const declarationOffsets = new Set([...functions.map(fn => fn.nameOffset), ...prototypeNameOffsets]);

        const events: LexicalEvent[] = scanLoops(code).map(loop => ({ kind: 'loop' as const, ...loop }));
        for (const match of code.matchAll(CALL_SITE)) {
            const offset = match.index ?? 0;
            const name = match[1];
            if (NON_CALL_WORDS.has(name) || declarationOffsets.has(offset) || isMemberAccess(code, offset)) continue;
            events.push({ kind: 'call', offset, name });
        }
        events.sort((a, b) => a.offset - b.offset);

        const collector = new ExtractionCollector(this.language, { tracksVariables: false, approximate: true });
        let next = 0;
        let current: LexicalFunction | undefined;

        const closeCurrent = (): void => {
            if (!current) return;
            const body = code.slice(current.bodyStart, current.bodyEnd + 1);
            collector.exitFunction(lineAt(current.bodyEnd), estimateCyclomaticComplexityFromText(body));
            current = undefined;
        };

        for (const event of events) {
            if (current && event.offset > current.bodyEnd) closeCurrent();
            while (!current && next < functions.length && functions[next].start <= event.offset) {
                const fn = functions[next++];
                collector.enterFunction(fn.name, lineAt(fn.start));
                current = fn;
                if (event.offset > fn.bodyEnd) closeCurrent();
            }
            if (event.kind === 'loop') {
                collector.addLoop(lineAt(event.offset), event.nestingDepth);
            } else {
                collector.recordCall(event.name);
            }
        }
        closeCurrent();
        while (next < functions.length) {
            const fn = functions[next++];
            collector.enterFunction(fn.name, lineAt(fn.start));
            current = fn;
            closeCurrent();
        }

        const extraction = collector.build();
        logger.debug(`Lexical scan found ${extraction.functions.length} functions and ${extraction.loops.length} loops`);
        return extraction;
    }
}
