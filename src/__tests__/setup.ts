// Jest setupFiles entry: runs before any module under test is loaded.
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';
