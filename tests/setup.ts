// Keep test output free of service logs
process.env.LOG_LEVEL = "silent";
