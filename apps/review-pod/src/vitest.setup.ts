process.env.JWT_SECRET = 'test-secret';
process.env.JWT_ALGORITHM = 'HS256';
