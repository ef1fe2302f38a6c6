// Loggers built by the code under test write plain JSON and stay quiet;
// tests that assert on log output pass their own level and destination.
process.env.PRETTY_LOGS = 'false'
process.env.LOG_LEVEL = 'silent'

export {}
