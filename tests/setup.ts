// Test setup file

// Service loggers read these when they are created, so set them before any source module loads
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'error';

// Debug output from a developer shell would otherwise change log levels under test
delete process.env.MDTASK_DEBUG;
delete process.env.MDTASK_LOG_FILE;
