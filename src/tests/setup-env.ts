// Test defaults. Runs before each test file imports anything from src/.
process.env.NODE_ENV = "test";
process.env.PROFILE ||= "test";
process.env.JWT_SECRET ||= "test-secret-test-secret-test-secret";
process.env.BCRYPT_ROUNDS ||= "4";

// Tests inject their own services; nothing may reach Redis or AWS.
delete process.env.REDIS_URL;
delete process.env.AWS_ENDPOINT_URL;
delete process.env.CORS_ORIGIN;
delete process.env.RATE_LIMIT_ENABLED;
delete process.env.AUDIT_LOGGING_ENABLED;
delete process.env.DEFAULT_TENANT_ID;
