process.env.NODE_ENV = 'test';
// Keep request and resolver logs out of the test output.
process.env.LOG_LEVEL = 'error';
