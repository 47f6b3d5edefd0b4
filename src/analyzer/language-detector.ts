// src/analyzer/language-detector.ts
import path from 'path';
import { SupportedLanguage, UnsupportedLanguageFailure } from './types.js';

/** Tags accepted by the CLI, the API and the MCP tool. */
export const LANGUAGE_TAGS: Record<string, SupportedLanguage> = {
    python: 'python',
    java: 'java',
    js: 'javascript',
    javascript: 'javascript',
    c: 'c',
    cpp: 'cpp',
};

const EXTENSION_LANGUAGES: Record<string, SupportedLanguage> = {
    '.py': 'python',
    '.java': 'java',
    '.js': 'javascript',
    '.mjs': 'javascript',
    '.cjs': 'javascript',
    '.c': 'c',
    '.h': 'c',
    '.cpp': 'cpp',
    '.cc': 'cpp',
    '.cxx': 'cpp',
    '.hpp': 'cpp',
    '.hh': 'cpp',
};

export type DetectionResult =
    | { ok: true; language: SupportedLanguage }
    | { ok: false; error: UnsupportedLanguageFailure };

function lookup(table: Record<string, SupportedLanguage>, key: string): SupportedLanguage | undefined {
    return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;
}

/**
 * Maps a user-supplied tag (or a file extension such as `.py`) to a language.
 * Tags are trimmed and matched case-insensitively; anything else is reported
 * back unchanged.
 */
export function detectLanguage(languageTag: string): DetectionResult {
    const key = languageTag.trim().toLowerCase();
    const language = key.startsWith('.') ? lookup(EXTENSION_LANGUAGES, key) : lookup(LANGUAGE_TAGS, key);
    if (language) {
        return { ok: true, language };
    }
    return {
        ok: false,
        error: {
            kind: 'UnsupportedLanguage',
            languageTag,
            message: `Unsupported language '${languageTag}'. Expected one of: ${Object.keys(LANGUAGE_TAGS).join(', ')}`,
        },
    };
}

/** Infers a language tag from a file name; undefined when the extension is unknown. */
export function languageFromPath(filePath: string): SupportedLanguage | undefined {
    return lookup(EXTENSION_LANGUAGES, path.extname(filePath).toLowerCase());
}
