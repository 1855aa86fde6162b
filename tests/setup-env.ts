process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.ADMIN_API_KEY = 'test-admin-key';
process.env.DB_PATH = ':memory:';
