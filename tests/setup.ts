// Mock environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_SILENT = 'true';
process.env.JWT_SECRET = 'test-secret';
process.env.MARKETPLACE_ADDRESS = '0x00000000000000000000000000000000000a11ce';
process.env.MARKETPLACE_ADMIN = '0x000000000000000000000000000000000000ad11';
process.env.FACTORY_ADDRESS = '0x0000000000000000000000000000000000fac701';

// Set test timeout
jest.setTimeout(30000);

// Mock logger to reduce noise in tests
jest.mock('../src/utils/logger', () => {
  const createMockLogger = (): Record<string, jest.Mock> => {
    const mockLogger: Record<string, jest.Mock> = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
    mockLogger.child = jest.fn(() => mockLogger);
    return mockLogger;
  };
  const logger = createMockLogger();
  return {
    logger,
    createLoggerWithContext: jest.fn(() => logger),
  };
});
