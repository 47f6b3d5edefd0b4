import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import winston from 'winston';
import { createApp } from './server.js';
import { AnalyzerService } from '../analyzer/analyzer-service.js';

const mockLogger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
} as unknown as winston.Logger;

const JS_SOURCE = 'function main() {\n    return helper();\n}\n\nfunction helper() {\n    return 1;\n}\n';

describe('API server', () => {
    const app = createApp(new AnalyzerService(mockLogger));

    it('GET /health', async () => {
        const response = await request(app).get('/health');
        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: 'ok' });
    });

    it('GET /api/languages lists the accepted tags', async () => {
        const response = await request(app).get('/api/languages');
        expect(response.body).toEqual({ languages: ['python', 'java', 'js', 'javascript', 'c', 'cpp'] });
    });

    it('POST /api/analyze returns the analysis result', async () => {
        const response = await request(app)
            .post('/api/analyze')
            .send({ sourceText: JS_SOURCE, language: 'js' });
        expect(response.status).toBe(200);
        expect(response.body.language).toBe('javascript');
        expect(response.body.deadCode).toEqual({ unusedFunctions: ['main'], unusedVariables: [] });
        expect(response.body.dependencies).toEqual({ main: ['helper'], helper: [] });
    });

    it('POST /api/analyze honours excludeEntryPoints', async () => {
        const response = await request(app)
            .post('/api/analyze')
            .send({ sourceText: JS_SOURCE, language: 'javascript', excludeEntryPoints: true });
        expect(response.body.deadCode.unusedFunctions).toEqual([]);
    });

    it('POST /api/analyze rejects malformed bodies', async () => {
        const response = await request(app).post('/api/analyze').send({ language: 'python' });
        expect(response.status).toBe(400);
        expect(response.body.error).toBe('Invalid request');
        expect(response.body.details[0].path).toEqual(['sourceText']);
    });

    it('POST /api/analyze reports unsupported languages as 422', async () => {
        const response = await request(app).post('/api/analyze').send({ sourceText: 'x', language: 'cobol' });
        expect(response.status).toBe(422);
        expect(response.body.error.kind).toBe('UnsupportedLanguage');
    });

    it('POST /api/analyze reports parse errors as 422', async () => {
        const response = await request(app).post('/api/analyze').send({ sourceText: 'def f(:\n', language: 'python' });
        expect(response.status).toBe(422);
        expect(response.body.error.kind).toBe('ParseError');
        expect(response.body.error.language).toBe('python');
    });
});
