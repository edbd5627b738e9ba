/**
 * Root test setup file
 *
 * Runs before every test file, ahead of any package import, so the shared
 * logger is created with test settings.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_FILE = 'false';
// Keep winston quiet unless a test run asks for output
process.env.LOG_CONSOLE = process.env.LOG_CONSOLE ?? 'false';
