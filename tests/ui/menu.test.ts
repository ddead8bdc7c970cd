import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import chalk from 'chalk';
import { mkdirSync } from 'fs';
import { Readable, Writable } from 'stream';
import { TaskStore } from '../../src/services/task-store.js';
import { InputClosedError, createReadlineIO, runMenu, type MenuIO } from '../../src/ui/menu.js';
import { renderGoodbye } from '../../src/ui/render.js';
import { TestDataDir, createMockLogger } from '../helpers.js';

function scriptedIO(answers: string[]) {
  const printed: string[] = [];
  const prompts: string[] = [];
  const io: MenuIO = {
    ask: async (prompt: string) => {
      prompts.push(prompt);
      const next = answers.shift();
      if (next === undefined) throw new InputClosedError();
      return next;
    },
    print: (text: string) => {
      printed.push(text);
    },
    close: () => {},
  };
  return { io, printed, prompts };
}

describe('runMenu', () => {
  let testDataDir: TestDataDir;
  let logger: ReturnType<typeof createMockLogger>;
  let store: TaskStore;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    testDataDir = new TestDataDir();
    logger = createMockLogger();
    store = new TaskStore(testDataDir.file(), logger);
  });

  afterEach(() => {
    testDataDir.cleanup();
  });

  it('should welcome the user with the storage path', async () => {
    const { io, printed } = scriptedIO(['9']);
    await runMenu(store, io, logger);
    expect(printed[0]).toBe(`🚀 Welcome to your Personal To-Do List Manager!\n📁 Tasks are stored in: ${store.path}`);
  });

  it('should add a task and exit', async () => {
    const { io, printed, prompts } = scriptedIO(['1', 'buy milk', '9']);

    await runMenu(store, io, logger);

    expect(printed).toContain("✓ Task added successfully: 'buy milk'");
    expect(printed[printed.length - 1]).toBe(renderGoodbye(false));
    expect(prompts).toEqual(['Enter your choice (1-9): ', '\n📝 Enter task description: ', 'Enter your choice (1-9): ']);
    expect(store.size).toBe(1);
  });

  it('should report an empty description', async () => {
    const { io, printed } = scriptedIO(['1', '   ', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain('❌ Error: Task description cannot be empty!');
    expect(store.size).toBe(0);
  });

  it('should reject an unknown choice', async () => {
    const { io, printed } = scriptedIO(['42', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain('❌ Invalid choice! Please enter a number between 1-9.');
  });

  it('should not ask for an id when nothing is pending', async () => {
    const { io, printed, prompts } = scriptedIO(['4', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain("\n🎉 Great! No pending tasks. You're all caught up!");
    expect(prompts).toHaveLength(2);
  });

  it('should complete a task by id', async () => {
    store.add('pay bills');
    const { io, printed } = scriptedIO(['4', '1', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain("✓ Task marked as completed: 'pay bills'");
    expect(store.stats().completed).toBe(1);
  });

  it('should remove a task by id', async () => {
    store.add('pay bills');
    const { io, printed } = scriptedIO(['5', '1', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain("✓ Task removed: 'pay bills'");
    expect(store.size).toBe(0);
  });

  it('should explain an id that is not a number', async () => {
    store.add('pay bills');
    const { io, printed } = scriptedIO(['5', 'first', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain('❌ Error: Please enter a valid task ID (number)!');
    expect(store.size).toBe(1);
  });

  it('should explain an unknown id', async () => {
    store.add('pay bills');
    const { io, printed } = scriptedIO(['4', '99', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain('❌ Error: No task found with ID 99');
  });

  it('should clear completed tasks', async () => {
    store.add('a');
    store.complete('1');
    const { io, printed } = scriptedIO(['6', '6', '9']);
    await runMenu(store, io, logger);
    expect(printed).toContain('✓ Cleared 1 completed task(s)');
    expect(printed).toContain('No completed tasks to clear!');
  });

  it('should say goodbye when input ends', async () => {
    const { io, printed } = scriptedIO(['2']);
    await runMenu(store, io, logger);
    expect(printed).toContain('\n📝 No tasks found! Your to-do list is empty.');
    expect(printed[printed.length - 1]).toBe(renderGoodbye(true));
  });

  it('should show a save warning after a successful add', async () => {
    const path = testDataDir.file('as-directory');
    mkdirSync(path);
    const failing = new TaskStore(path, logger);
    const { io, printed } = scriptedIO(['1', 'buy milk', '9']);

    await runMenu(failing, io, logger);

    const added = printed.indexOf("✓ Task added successfully: 'buy milk'");
    expect(added).toBeGreaterThan(-1);
    expect(printed[added + 1]).toMatch(/^⚠️ {2}Warning: Error saving tasks: /);
    expect(failing.size).toBe(1);
  });

  it('should keep running after an unexpected error', async () => {
    const failure = new Error('boom');
    vi.spyOn(store, 'stats').mockImplementationOnce(() => {
      throw failure;
    });
    const { io, printed } = scriptedIO(['7', '7', '9']);

    await runMenu(store, io, logger);

    expect(printed).toContain('❌ An error occurred: boom');
    expect(printed).toContain('\n📊 Statistics: No tasks available');
    expect(logger.error).toHaveBeenCalledWith('Unexpected error in menu loop', failure);
  });
});

describe('createReadlineIO', () => {
  let testDataDir: TestDataDir;
  let store: TaskStore;
  let logger: ReturnType<typeof createMockLogger>;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    testDataDir = new TestDataDir();
    logger = createMockLogger();
    store = new TaskStore(testDataDir.file(), logger);
  });

  afterEach(() => {
    testDataDir.cleanup();
  });

  function collector() {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk, _encoding, callback) {
        chunks.push(String(chunk));
        callback();
      },
    });
    return { output, text: () => chunks.join('') };
  }

  it('should answer every prompt from input that arrives in one chunk', async () => {
    const { output, text } = collector();
    const io = createReadlineIO(Readable.from(['1\nbuy milk\n9\n']), output);

    try {
      await runMenu(store, io, logger);
    } finally {
      io.close();
    }

    expect(store.size).toBe(1);
    expect(text()).toContain("✓ Task added successfully: 'buy milk'");
    expect(text()).toContain('Thank you for using To-Do List Manager!');
  });

  it('should say goodbye when piped input runs out', async () => {
    const { output, text } = collector();
    const io = createReadlineIO(Readable.from(['2\n']), output);

    try {
      await runMenu(store, io, logger);
    } finally {
      io.close();
    }

    expect(text()).toContain('No tasks found! Your to-do list is empty.');
    expect(text().endsWith(`${renderGoodbye(true)}\n`)).toBe(true);
  });
});
