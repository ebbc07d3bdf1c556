/**
 * Meeting Summary Generator
 *
 * Turns a saved transcript log into a Markdown meeting summary with OpenAI
 * and writes it next to the other session artifacts.
 */

import OpenAI from 'openai';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { ScribeError, errorMessage } from '../errors.js';
import { formatFileStamp } from '../export/transcript-exporter.js';

const SUMMARY_PROMPT = `You are a professional meeting summarizer. Analyze the meeting transcription and write a comprehensive, well-structured summary.

Use Markdown with exactly these sections:

# Meeting Summary

## Key Discussion Points
- Main topics discussed with brief explanations

## Decisions Made
- Decisions reached during the meeting

## Action Items
- Tasks, assignments and follow-ups, with responsible parties when mentioned

## Important Questions Raised
- Significant questions and whether they were resolved

## Next Steps
- Planned future actions or meetings

## Additional Notes
- Any other relevant context

Be concise but complete, use bullet points, and attribute points to speakers where the transcript names them.`;

/**
 * The slice of the OpenAI client the summarizer calls
 */
export interface SummaryClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'system' | 'user'; content: string }>;
        temperature: number;
        max_tokens: number;
      }): PromiseLike<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface SummaryOptions {
  /** Pre-built client, mainly for tests */
  client?: SummaryClient;
  apiKey?: string;
  model?: string;
  /** Summaries land in <outputDir>/summaries */
  outputDir?: string;
  /** Longer transcripts are cut to stay within token limits */
  maxLines?: number;
}

export interface SummaryResult {
  summaryPath: string;
  markdown: string;
  model: string;
  truncated: boolean;
}

/**
 * Generate and save a summary for a transcript log file
 */
export async function generateMeetingSummary(
  transcriptPath: string,
  options: SummaryOptions = {}
): Promise<SummaryResult> {
  const startTime = Date.now();
  const model = options.model ?? 'gpt-4o-mini';
  const outputDir = options.outputDir ?? '.logs';
  const maxLines = options.maxLines ?? 2000;

  let transcript: string;
  try {
    transcript = (await readFile(transcriptPath, 'utf-8')).trim();
  } catch (error) {
    throw new ScribeError(
      `Transcript not found: ${transcriptPath} (${errorMessage(error)})`,
      'TRANSCRIPT_NOT_FOUND',
      { transcriptPath }
    );
  }

  if (!transcript) {
    throw new ScribeError(`Transcript is empty: ${transcriptPath}`, 'TRANSCRIPT_EMPTY', { transcriptPath });
  }

  const lines = transcript.split('\n');
  const truncated = lines.length > maxLines;
  const body = truncated
    ? lines.slice(0, maxLines).join('\n') + '\n... (transcript truncated)'
    : transcript;

  console.log(`[Summary] 🤖 Summarizing ${transcriptPath} (${lines.length} lines) with ${model}...`);

  const client: SummaryClient = options.client ?? new OpenAI({ apiKey: options.apiKey });
  const completion = await client.chat.completions.create({
    model,
    messages: [
      { role: 'system', content: SUMMARY_PROMPT },
      { role: 'user', content: `Please summarize this meeting transcription:\n\n${body}` },
    ],
    temperature: 0.3,
    max_tokens: 2000,
  });

  const markdown = completion.choices[0]?.message.content?.trim();
  if (!markdown) {
    throw new ScribeError('No content in OpenAI response', 'SUMMARY_EMPTY', { transcriptPath });
  }

  const summaryDir = path.join(outputDir, 'summaries');
  await mkdir(summaryDir, { recursive: true });
  const summaryPath = path.join(summaryDir, `summary_${formatFileStamp(new Date())}.md`);
  await writeFile(summaryPath, markdown + '\n', 'utf-8');

  console.log(`[Summary] ✅ Summary written to ${summaryPath} in ${Date.now() - startTime}ms`);

  return { summaryPath, markdown, model, truncated };
}
