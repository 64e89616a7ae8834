import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { convertRecords, exportSession, generateMarkdown } from '../commands/export.js';
import { InvalidModeError, LeafNotFoundError, MalformedRecordError } from '../errors.js';
import type { ExportOptions } from '../types/index.js';
import { parseJsonlLines } from '../utils/jsonl.js';
import { lines, message, shell } from './helpers.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/session.jsonl', import.meta.url));
const records = parseJsonlLines(fs.readFileSync(FIXTURE, 'utf8'));

const defaults: ExportOptions = {
  sourcePath: 'logs/session.jsonl',
  mode: 'all',
  thinkingStyle: 'details',
  includeBash: false,
  includeTimestamps: false,
  groupTurns: true,
};

const THINKING_BLOCK = ['<details>', '<summary>thinking</summary>', '', '> Check the logs first.', '>', '> Then the config.', '', '</details>'];

describe('generateMarkdown', () => {
  it('should export the whole file with grouped turns', () => {
    expect(generateMarkdown(records, defaults)).toBe(
      lines(
        '# Session transcript — session.jsonl',
        '',
        '- id: `S1`',
        '- started: `2026-02-19T08:37:11.936Z`',
        '- cwd: `/home/x`',
        '- source: `logs/session.jsonl`',
        '- mode: `all`',
        '- thinking: `details`',
        '- group_turns: `on`',
        '',
        '---',
        '',
        '### USER',
        '',
        'Fix the build',
        '',
        '### ASSISTANT',
        '',
        'Looking at it.',
        '',
        'Build passes now.',
        '',
        ...THINKING_BLOCK,
        '',
        '### USER',
        '',
        'Try another approach',
        '',
      ),
    );
  });

  it('should export the branch ending at the most recent message', () => {
    const result = convertRecords(records, { ...defaults, mode: 'branch' });

    expect(result.leafId).toBe('m5');
    expect(result.markdown).toContain('- mode: `branch`\n- leaf: `m5`\n- thinking: `details`');
    expect(result.markdown.endsWith(
      lines(
        '---',
        '',
        '### USER',
        '',
        'Fix the build',
        '',
        '### ASSISTANT',
        '',
        'Looking at it.',
        '',
        ...THINKING_BLOCK,
        '',
        '### USER',
        '',
        'Try another approach',
        '',
      ),
    )).toBe(true);
  });

  it('should report records read separately from records selected', () => {
    const all = convertRecords(records, defaults);
    expect(all.recordsRead).toBe(7);
    expect(all.selectedRecords).toBe(7);

    const branch = convertRecords(records, { ...defaults, mode: 'branch' });
    expect(branch.recordsRead).toBe(7);
    expect(branch.selectedRecords).toBe(5);
  });

  it('should produce identical output when the resolved leaf is passed back in', () => {
    const first = convertRecords(records, { ...defaults, mode: 'branch' });
    const second = convertRecords(records, { ...defaults, mode: 'branch', leafId: first.leafId });
    expect(second.markdown).toBe(first.markdown);
  });

  it('should render shell records and timestamps along an explicit branch', () => {
    const markdown = generateMarkdown(records, {
      ...defaults,
      mode: 'branch',
      leafId: 'm4',
      includeBash: true,
      includeTimestamps: true,
      groupTurns: false,
      thinkingStyle: 'omit',
    });

    const body = markdown.slice(markdown.indexOf('---\n') + 5);
    expect(body).toBe(
      lines(
        '### USER',
        '',
        '_timestamp: 2026-02-19T08:37:20.000Z_',
        '',
        'Fix the build',
        '',
        '### ASSISTANT',
        '',
        '_timestamp: 2026-02-19T08:37:25.000Z_',
        '',
        'Looking at it.',
        '',
        '### SYSTEM (bashExecution)',
        '',
        '_timestamp: 2026-02-19T08:37:30.000Z_',
        '',
        'Command:',
        '```bash',
        'make build',
        '```',
        '',
        'Output:',
        '```text',
        'ok',
        '```',
        '',
        '### ASSISTANT',
        '',
        '_timestamp: 2026-02-19T08:37:40.000Z_',
        '',
        'Build passes now.',
        '',
      ),
    );
    expect(markdown).toContain('- timestamps: `on`');
    expect(markdown).not.toContain('<details>');
  });

  it('should render two user turns around an included shell record', () => {
    const result = convertRecords([message('user', 'a'), shell('ls', 'x'), message('user', 'b')], { ...defaults, includeBash: true });
    expect(result.blocks.map((b) => b.kind)).toEqual(['turn', 'shell', 'turn']);
    expect(result.markdown.match(/^### USER$/gm)).toHaveLength(2);
  });

  it('should render exactly one details block per assistant turn', () => {
    const input = [
      message('assistant', [{ type: 'thinking', thinking: 'a' }, { type: 'text', text: 'x' }]),
      message('assistant', [{ type: 'thinking', thinking: 'b' }]),
    ];
    const markdown = generateMarkdown(input, defaults);
    expect(markdown.match(/<details>/g)).toHaveLength(1);
    expect(markdown).toContain('> a\n\n> b');
  });

  it('should leave out empty user messages entirely', () => {
    const markdown = generateMarkdown([message('user', '   '), message('assistant', 'reply')], defaults);
    expect(markdown).not.toContain('### USER');
    expect(markdown).toContain('### ASSISTANT\n\nreply\n');
  });

  it('should reject an unknown mode before reading records', () => {
    const options = Object.assign({}, defaults, { mode: 'tree' });
    expect(() => generateMarkdown(records, options)).toThrow(InvalidModeError);
  });

  it('should fail branch mode on an unknown leaf', () => {
    expect(() => generateMarkdown(records, { ...defaults, mode: 'branch', leafId: 'missing' })).toThrow(LeafNotFoundError);
  });

  it('should fail branch mode on an empty input but not all mode', () => {
    expect(() => generateMarkdown([], { ...defaults, mode: 'branch' })).toThrow('Could not resolve leaf id (is the input empty?)');
    expect(generateMarkdown([], defaults).endsWith('---\n')).toBe(true);
  });
});

describe('exportSession', () => {
  let dir: string | undefined;

  afterEach(() => {
    vi.restoreAllMocks();
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should write the document to a file, creating parent directories', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-md-'));
    const output = path.join(dir, 'nested', 'out', 'session.md');

    const result = exportSession({ ...defaults, input: FIXTURE, output });

    expect(fs.readFileSync(output, 'utf8')).toBe(result.markdown);
    expect(result.markdown).toContain(`- source: \`${FIXTURE}\``);
    expect(result.recordsRead).toBe(7);
  });

  it('should write to stdout for "-"', () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    const result = exportSession({ ...defaults, input: FIXTURE, output: '-' });

    expect(write).toHaveBeenCalledWith(result.markdown);
  });

  it('should not create the output file when the input is malformed', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-md-'));
    const input = path.join(dir, 'bad.jsonl');
    const output = path.join(dir, 'bad.md');
    fs.writeFileSync(input, '{"type":"session","id":"S1"}\n{oops\n', 'utf8');

    expect(() => exportSession({ ...defaults, input, output })).toThrow(MalformedRecordError);
    expect(fs.existsSync(output)).toBe(false);
  });
});
