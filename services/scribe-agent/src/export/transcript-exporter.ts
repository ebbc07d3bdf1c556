/**
 * Transcript Export
 *
 * Invoked once per session when it reaches `finalized`. The file exporter
 * writes two artifacts under the output directory:
 *
 *   transcripts/<stamp>-transcription.log   one "[HH:MM:SS] Name: text" line per fragment
 *   documents/<stamp>-transcript.md         titled document with session metadata
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { ParticipantNames, Transcript, TranscriptFragment } from '@voice-scribe/types';

// =============================================================================
// Types
// =============================================================================

export interface ExportResult {
  transcriptPath: string;
  documentPath: string;
}

export interface TranscriptExporter {
  render(transcript: Transcript, names: ParticipantNames): Promise<ExportResult>;
}

export const FAILED_FRAGMENT_TEXT = '[transcription failed]';
export const DOCUMENT_TITLE = 'Meeting Transcription';

// =============================================================================
// Formatting
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Local-time file stamp, e.g. 2024-03-09_14-05-00
 */
export function formatFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * Elapsed time as HH:MM:SS (negative offsets clamp to zero)
 */
export function formatOffset(offsetMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(offsetMs / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`;
}

function sessionOrigin(transcript: Transcript): number {
  return transcript.sessionStartedAt ?? transcript.fragments[0]?.startTimestamp ?? 0;
}

function displayName(names: ParticipantNames, speakerId: string): string {
  return names.get(speakerId) ?? speakerId;
}

function fragmentText(fragment: TranscriptFragment): string {
  return fragment.status === 'failed' ? FAILED_FRAGMENT_TEXT : fragment.text;
}

/**
 * One line per fragment, in transcript order
 */
export function formatTranscriptLines(transcript: Transcript, names: ParticipantNames): string[] {
  const origin = sessionOrigin(transcript);
  return transcript.fragments.map(
    (fragment) =>
      `[${formatOffset(fragment.startTimestamp - origin)}] ${displayName(names, fragment.speakerId)}: ${fragmentText(fragment)}`
  );
}

/**
 * Speakers in order of first appearance
 */
export function listParticipants(transcript: Transcript, names: ParticipantNames): string[] {
  const seen = new Set<string>();
  for (const fragment of transcript.fragments) {
    seen.add(fragment.speakerId);
  }
  return Array.from(seen, (speakerId) => displayName(names, speakerId));
}

export function formatTranscriptDocument(transcript: Transcript, names: ParticipantNames): string {
  const origin = sessionOrigin(transcript);
  const failed = transcript.fragments.filter((f) => f.status === 'failed').length;
  const participants = listParticipants(transcript, names);

  const lines = [
    `# ${DOCUMENT_TITLE}`,
    '',
    `- **Started:** ${new Date(origin).toISOString()}`,
    `- **Fragments:** ${transcript.fragments.length}${failed > 0 ? ` (${failed} failed)` : ''}`,
    `- **Participants:** ${participants.length > 0 ? participants.join(', ') : 'none'}`,
    '',
    '## Transcript',
    '',
  ];

  if (transcript.fragments.length === 0) {
    lines.push('_Nothing was transcribed._');
  }

  for (const fragment of transcript.fragments) {
    lines.push(
      `- \`${formatOffset(fragment.startTimestamp - origin)}\` **${displayName(names, fragment.speakerId)}:** ${fragmentText(fragment)}`
    );
  }

  return lines.join('\n') + '\n';
}

// =============================================================================
// File Exporter
// =============================================================================

export class FileTranscriptExporter implements TranscriptExporter {
  private outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async render(transcript: Transcript, names: ParticipantNames): Promise<ExportResult> {
    const stamp = formatFileStamp(new Date(sessionOrigin(transcript) || Date.now()));
    const transcriptDir = path.join(this.outputDir, 'transcripts');
    const documentDir = path.join(this.outputDir, 'documents');

    await mkdir(transcriptDir, { recursive: true });
    await mkdir(documentDir, { recursive: true });

    const transcriptPath = path.join(transcriptDir, `${stamp}-transcription.log`);
    const documentPath = path.join(documentDir, `${stamp}-transcript.md`);

    const logLines = formatTranscriptLines(transcript, names);
    await writeFile(transcriptPath, logLines.length > 0 ? logLines.join('\n') + '\n' : '', 'utf-8');
    await writeFile(documentPath, formatTranscriptDocument(transcript, names), 'utf-8');

    console.log(`[Export] 💾 Transcript written to ${transcriptPath}`);
    console.log(`[Export] 📄 Document written to ${documentPath}`);

    return { transcriptPath, documentPath };
  }

  get directory(): string {
    return this.outputDir;
  }
}

export default FileTranscriptExporter;
