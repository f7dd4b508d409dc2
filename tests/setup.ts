// Runs before each test file
import { Logger, LogLevel } from '../src/utils/logger';

// Child loggers copy the level when created, so set it before anything is constructed
Logger.getInstance().setLevel(LogLevel.SILENT);

beforeAll(() => {
  process.env.NODE_ENV = 'test';
});

afterEach(() => {
  jest.restoreAllMocks();
});
