/**
 * Global test setup using Mocha root hooks
 *
 * Configuration is read from TODO_* environment variables: every test starts
 * from the environment the run was started with.
 */

const PREFIX = 'TODO_';

let saved: Record<string, string> = {};

const todoVars = (): string[] =>
  Object.keys(process.env).filter(key => key.startsWith(PREFIX));

export const mochaHooks = {
  beforeAll(): void {
    saved = {};
    for (const key of todoVars()) {
      const value = process.env[key];
      if (value !== undefined) saved[key] = value;
    }
  },

  afterEach(): void {
    for (const key of todoVars()) {
      if (!(key in saved)) delete process.env[key];
    }
    for (const [key, value] of Object.entries(saved)) {
      process.env[key] = value;
    }
  },
};
