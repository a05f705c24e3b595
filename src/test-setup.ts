import { vi } from 'vitest';

// The logger writes to stderr; keep test output readable.
vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
