// Keep Jest runs quiet and deterministic
process.env.NODE_ENV = 'test';
process.env.QUIET = '1';
delete process.env.VERBOSE;
