// Global test setup
import 'jest';

// Colour functions return their input unchanged so output can be asserted as text
jest.mock('chalk', () => {
  const identity = (): jest.Mock => jest.fn((str: string) => str);
  const chalk = {
    green: identity(),
    red: identity(),
    yellow: identity(),
    cyan: identity(),
    gray: identity(),
    bold: identity(),
    level: 3,
  };
  return { ...chalk, default: chalk };
});

// Mock process.exit to prevent tests from actually exiting
jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null | undefined) => {
  throw new Error(`Process.exit called with code: ${code}`);
});

// Mock process.cwd to return a consistent value
jest.spyOn(process, 'cwd').mockReturnValue('/test/workspace');

export {};
