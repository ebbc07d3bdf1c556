/**
 * Participant Registry
 *
 * Maps opaque speaker ids (LiveKit participant identities) to display names.
 * Loaded from a JSON file between sessions; a session works from the snapshot
 * taken when capture started.
 *
 * participants.json:
 *   {
 *     "user-4f2a": "Alice",
 *     "42": "Bob"
 *   }
 */

import { readFile } from 'fs/promises';
import type { ParticipantNames } from '@voice-scribe/types';
import { ConfigurationError, UnknownSpeakerError, errorMessage } from '../errors.js';

export type ParticipantMapLoader = (path: string) => Promise<Map<string, string>>;

/**
 * Read a { speakerId: displayName } JSON object
 */
export async function loadParticipantMap(path: string): Promise<Map<string, string>> {
  const raw = await readFile(path, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Participant map ${path} is not valid JSON: ${errorMessage(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Participant map ${path} must be a JSON object`);
  }

  const names = new Map<string, string>();
  for (const [speakerId, name] of Object.entries(parsed)) {
    if (typeof name !== 'string' || name.trim() === '') {
      console.warn(`[Participants] ⚠️ Skipping ${speakerId}: display name must be a non-empty string`);
      continue;
    }
    names.set(speakerId, name.trim());
  }

  return names;
}

export interface ParticipantRegistryConfig {
  /** Default map file, used when reload() gets no path */
  path?: string;
  loader: ParticipantMapLoader;
}

export class ParticipantRegistry {
  private config: ParticipantRegistryConfig;
  private names: Map<string, string> = new Map();
  private reportedUnknown: Set<string> = new Set();

  constructor(config: Partial<ParticipantRegistryConfig> = {}) {
    this.config = {
      loader: loadParticipantMap,
      ...config,
    };
  }

  /**
   * Replace the map from file. A failed load leaves the registry empty so
   * capture can go on with raw ids.
   */
  async reload(path: string | undefined = this.config.path): Promise<number> {
    this.reportedUnknown.clear();

    if (!path) {
      this.names = new Map();
      console.log('[Participants] ℹ️ No participant map configured, using raw ids');
      return 0;
    }

    try {
      this.names = await this.config.loader(path);
      this.config.path = path;
      console.log(`[Participants] ✅ Loaded ${this.names.size} participant(s) from ${path}`);
    } catch (error) {
      this.names = new Map();
      console.error(`[Participants] ❌ Failed to load ${path}: ${errorMessage(error)}`);
    }

    return this.names.size;
  }

  /**
   * Display name, or the raw id when unmapped
   */
  resolve(speakerId: string): string {
    const name = this.names.get(speakerId);
    if (name !== undefined) {
      return name;
    }

    if (!this.reportedUnknown.has(speakerId)) {
      this.reportedUnknown.add(speakerId);
      console.warn(`[Participants] ⚠️ ${new UnknownSpeakerError(speakerId).message}, using raw id`);
    }
    return speakerId;
  }

  /**
   * Read-only copy for one session
   */
  snapshot(): ParticipantNames {
    return new Map(this.names);
  }

  get size(): number {
    return this.names.size;
  }

  get path(): string | undefined {
    return this.config.path;
  }
}

export default ParticipantRegistry;
