// Keep test output readable
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
