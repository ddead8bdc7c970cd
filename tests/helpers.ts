import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { vi } from 'vitest';

/**
 * Test helper utilities
 */

export class TestDataDir {
  private testDir: string;

  constructor() {
    this.testDir = mkdtempSync(join(tmpdir(), 'todo-test-'));
  }

  file(name: string = 'tasks.txt'): string {
    return join(this.testDir, name);
  }

  cleanup(): void {
    rmSync(this.testDir, { recursive: true, force: true });
  }
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
