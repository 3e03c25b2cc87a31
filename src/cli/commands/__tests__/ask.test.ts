/**
 * Tests for the ask command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';

import { createAskCommand, queryFailure, toSourceJSON } from '../ask.js';
import type { CommandContext } from '../../types.js';
import { createCourseAssistant } from '../../../agent/factory.js';
import { OUTLINE_TOOL_NAME, SEARCH_TOOL_NAME } from '../../../agent/tools/index.js';
import { CLIError, IndexUnavailableError } from '../../../errors/index.js';
import { textResponse, toolCallResponse, type ScriptedStep } from '../../../test-utils/index.js';
import { createTestHandle, FIXTURES, type TestHandle } from './assistant-handle.js';

vi.mock('../../../agent/factory.js', () => ({
  createCourseAssistant: vi.fn(),
}));

describe('createAskCommand', () => {
  let home: string;
  let logOutput: string[];
  let mockContext: CommandContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let current: TestHandle | undefined;

  function useAssistant(steps: ScriptedStep[]): TestHandle {
    current = createTestHandle(steps);
    vi.mocked(createCourseAssistant).mockResolvedValue(current.handle);
    return current;
  }

  async function run(...args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createAskCommand(() => mockContext));
    await program.parseAsync(['node', 'test', 'ask', ...args]);
  }

  function jsonOutput(): unknown {
    const printed = consoleLogSpy.mock.calls[0]?.[0];
    return typeof printed === 'string' ? JSON.parse(printed) : undefined;
  }

  beforeEach(() => {
    vi.clearAllMocks();
    home = mkdtempSync(join(tmpdir(), 'cqa-ask-'));
    vi.stubEnv('CQA_HOME', home);

    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    current?.db.close();
    current = undefined;
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(home, { recursive: true, force: true });
  });

  describe('command structure', () => {
    it('creates command with correct name', () => {
      expect(createAskCommand(() => mockContext).name()).toBe('ask');
    });

    it('accepts --session and --model', () => {
      const flags = createAskCommand(() => mockContext).options.map((o) => o.long);
      expect(flags).toEqual(['--session', '--model']);
    });
  });

  describe('text output', () => {
    it('prints the answer with numbered sources', async () => {
      const { assistant } = useAssistant([
        toolCallResponse(SEARCH_TOOL_NAME, {
          query: 'cosine similarity',
          course_name: 'Building Vector Search',
          lesson_number: 1,
        }),
        textResponse('Cosine similarity measures closeness.'),
      ]).handle;
      await assistant.loadDocuments(FIXTURES);

      await run('How is closeness measured?');

      expect(logOutput[0]).toBe('Cosine similarity measures closeness.');
      const output = logOutput.join('\n');
      expect(output).toContain('Sources:');
      expect(output).toContain(
        '  [1] Building Vector Search - Lesson 1 (https://example.com/courses/vector-search/lesson-1)'
      );
      expect(output).toMatch(/Session: session_/);
    });

    it('prints no sources section for a direct answer', async () => {
      useAssistant([textResponse('Paris.')]);

      await run('Capital of France?');

      expect(logOutput[0]).toBe('Paris.');
      expect(logOutput.join('\n')).not.toContain('Sources:');
    });

    it('loads the configured documents folder on startup and trims the question', async () => {
      const { model } = useAssistant([textResponse('Paris.')]);

      await run('  Capital of France?  ');

      expect(createCourseAssistant).toHaveBeenCalledWith(
        expect.anything(),
        expect.objectContaining({ loadDocuments: true })
      );
      expect(model.requests[0]?.messages).toEqual([{ role: 'user', content: 'Capital of France?' }]);
    });

    it('closes the assistant after answering', async () => {
      const { handle } = useAssistant([textResponse('Paris.')]);

      await run('Capital of France?');

      expect(handle.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('JSON output', () => {
    beforeEach(() => {
      mockContext.options.json = true;
    });

    it('outputs answer, sources and session id', async () => {
      const { assistant } = useAssistant([
        toolCallResponse(OUTLINE_TOOL_NAME, { course_title: 'Building Vector Search' }),
        textResponse('Three lessons.'),
      ]).handle;
      await assistant.loadDocuments(FIXTURES);

      await run('Outline of Building Vector Search?');

      expect(jsonOutput()).toEqual({
        answer: 'Three lessons.',
        sources: [{ course_title: 'Building Vector Search', link: 'https://example.com/courses/vector-search' }],
        session_id: expect.stringMatching(/^session_/),
      });
      expect(logOutput).toEqual([]);
    });

    it('answers under the given session id', async () => {
      useAssistant([textResponse('Hello.')]);

      await run('Hi', '--session', 'session_abc');

      expect(jsonOutput()).toEqual({ answer: 'Hello.', sources: [], session_id: 'session_abc' });
    });
  });

  describe('errors', () => {
    it('rejects an empty question before creating the assistant', async () => {
      await expect(run('   ')).rejects.toThrow('Question cannot be empty');
      expect(createCourseAssistant).not.toHaveBeenCalled();
    });

    it('reports a model failure as a failed query with its exit code', async () => {
      const { handle } = useAssistant([new Error('overloaded')]);

      const error: unknown = await run('Anything?').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CLIError);
      expect(error).toMatchObject({
        message: 'Failed to answer query: Language model unavailable: overloaded',
        code: 10,
      });
      expect(handle.close).toHaveBeenCalledTimes(1);
    });
  });
});

describe('queryFailure', () => {
  it('keeps the hint and code of a CLIError', () => {
    const wrapped = queryFailure(new IndexUnavailableError('disk gone'));

    expect(wrapped.message.startsWith('Failed to answer query: ')).toBe(true);
    expect(wrapped.code).toBe(9);
  });

  it('wraps other errors with exit code 1', () => {
    const wrapped = queryFailure(new TypeError('boom'));

    expect(wrapped.message).toBe('Failed to answer query: boom');
    expect(wrapped.code).toBe(1);
  });
});

describe('toSourceJSON', () => {
  it('uses snake_case keys', () => {
    expect(toSourceJSON({ courseTitle: 'Intro', lessonNumber: 0, link: 'https://example.com/0' })).toEqual({
      course_title: 'Intro',
      lesson_number: 0,
      link: 'https://example.com/0',
    });
  });
});
