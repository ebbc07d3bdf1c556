import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { generateMeetingSummary, type SummaryClient } from '../src/services/summary-generator.js';
import { ScribeError } from '../src/errors.js';

type CreateCompletion = SummaryClient['chat']['completions']['create'];

function fakeClient(content: string | null) {
  const create = vi.fn<CreateCompletion>().mockResolvedValue({ choices: [{ message: { content } }] });
  const client: SummaryClient = { chat: { completions: { create } } };
  return { client, create };
}

describe('generateMeetingSummary', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'summary-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function writeTranscript(contents: string): Promise<string> {
    const file = path.join(dir, 'session.log');
    await writeFile(file, contents, 'utf-8');
    return file;
  }

  it('summarizes the transcript and writes the markdown', async () => {
    const transcriptPath = await writeTranscript('[00:00:01] Alice: Ship on Friday.\n[00:00:04] Bob: Agreed.\n');
    const { client, create } = fakeClient('# Meeting Summary\n\n## Decisions Made\n- Ship on Friday  ');

    const result = await generateMeetingSummary(transcriptPath, { client, outputDir: dir, model: 'gpt-4o' });

    expect(result.model).toBe('gpt-4o');
    expect(result.truncated).toBe(false);
    expect(result.markdown).toBe('# Meeting Summary\n\n## Decisions Made\n- Ship on Friday');
    expect(path.dirname(result.summaryPath)).toBe(path.join(dir, 'summaries'));
    expect(path.basename(result.summaryPath)).toMatch(/^summary_\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\.md$/);
    await expect(readFile(result.summaryPath, 'utf-8')).resolves.toBe(result.markdown + '\n');

    const [body] = create.mock.calls[0];
    expect(body).toMatchObject({ model: 'gpt-4o', temperature: 0.3, max_tokens: 2000 });
    expect(body.messages[0].role).toBe('system');
    expect(body.messages[1]).toEqual({
      role: 'user',
      content: 'Please summarize this meeting transcription:\n\n[00:00:01] Alice: Ship on Friday.\n[00:00:04] Bob: Agreed.',
    });
  });

  it('cuts long transcripts', async () => {
    const transcriptPath = await writeTranscript('one\ntwo\nthree\nfour');
    const { client, create } = fakeClient('# Meeting Summary');

    const result = await generateMeetingSummary(transcriptPath, { client, outputDir: dir, maxLines: 2 });

    expect(result.truncated).toBe(true);
    expect(create.mock.calls[0][0].messages[1].content).toBe(
      'Please summarize this meeting transcription:\n\none\ntwo\n... (transcript truncated)'
    );
  });

  it('rejects a missing transcript', async () => {
    const { client, create } = fakeClient('unused');

    await expect(
      generateMeetingSummary(path.join(dir, 'nope.log'), { client, outputDir: dir })
    ).rejects.toMatchObject({ code: 'TRANSCRIPT_NOT_FOUND' });
    expect(create).not.toHaveBeenCalled();
  });

  it('rejects an empty transcript', async () => {
    const transcriptPath = await writeTranscript('  \n');
    const { client } = fakeClient('unused');

    await expect(generateMeetingSummary(transcriptPath, { client, outputDir: dir })).rejects.toBeInstanceOf(
      ScribeError
    );
  });

  it('fails when the model returns no content', async () => {
    const transcriptPath = await writeTranscript('[00:00:01] Alice: Hello.');
    const { client } = fakeClient(null);

    await expect(generateMeetingSummary(transcriptPath, { client, outputDir: dir })).rejects.toMatchObject({
      code: 'SUMMARY_EMPTY',
    });
  });
});
