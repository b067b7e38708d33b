// Loaded by vitest before every test file (see vitest.config.ts).
process.env.NODE_ENV ??= 'test';
process.env.LOG_SILENT ??= 'true';
