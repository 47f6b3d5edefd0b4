// src/analyzer/parser.ts
import { SupportedLanguage, SyntaxExtractor } from './types.js';
import { PythonParser } from './parsers/python-parser.js';
import { JavaParser } from './parsers/java-parser.js';
import { JavaScriptParser } from './parsers/javascript-parser.js';
import { CCppParser } from './parsers/c-cpp-parser.js';

/**
 * Returns a fresh extractor for `language`. Extractors own their parser
 * state, so one per request keeps concurrent analyses independent.
 */
export function createExtractor(language: SupportedLanguage): SyntaxExtractor {
    switch (language) {
        case 'python':
            return new PythonParser();
        case 'java':
            return new JavaParser();
        case 'javascript':
            return new JavaScriptParser();
        case 'c':
        case 'cpp':
            return new CCppParser(language);
    }
}
