import { beforeEach, afterEach } from 'vitest';

// Tests must not depend on the caller's shell: a TYPST_RSX_* variable set
// there would change compiler selection, timeouts and logging.
const KEYS = ['TYPST_RSX_BIN', 'TYPST_RSX_TIMEOUT_MS', 'TYPST_RSX_DEBUG'];

beforeEach(() => {
  for (const key of KEYS) delete process.env[key];
  process.env.NODE_ENV = 'test';
});

afterEach(() => {
  for (const key of KEYS) delete process.env[key];
});
