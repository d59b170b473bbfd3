/**
 * Jest test setup file
 * Runs before each test file
 */

// Set test environment variables
process.env['NODE_ENV'] = 'test';
process.env['APP_ENV'] = 'development';
process.env['STORAGE_DRIVER'] = 'memory';
delete process.env['CLOUD_API_KEY'];
