/**
 * Hash-Chained Healing Log
 *
 * Append-only JSONL record of every self-heal mutation, chained with SHA-256
 * so that an edited or dropped line is detectable.
 *
 * Hash Formula:
 * hash = SHA256(JSON.stringify([sequence, timestamp, rule, reason, config_path, directives, prev_hash]))
 *
 * @module audit/healing-log
 * @version 1.0.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as crypto from 'node:crypto';
import * as readline from 'node:readline';
import {
  type HealingEntry,
  HealingEntrySchema,
  type Result,
  ok,
  err,
} from '../types/index.js';
import { getHealingLogPath } from '../config/config.js';
import { healLogger } from '../utils/logger.js';

// ═══════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════

export const GENESIS_HASH = '0'.repeat(64);

// ═══════════════════════════════════════════════════════════════════════════
// HASH COMPUTATION
// ═══════════════════════════════════════════════════════════════════════════

function computeHash(entry: Omit<HealingEntry, 'hash'>): string {
  const data = JSON.stringify([
    entry.sequence,
    entry.timestamp,
    entry.rule,
    entry.reason,
    entry.config_path,
    entry.directives,
    entry.prev_hash,
  ]);
  return crypto.createHash('sha256').update(data).digest('hex');
}

function parseLine(line: string): HealingEntry | null {
  try {
    const parsed = HealingEntrySchema.safeParse(JSON.parse(line));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface HealingRecord {
  rule: string;
  reason: string;
  configPath: string;
  directives: string[];
}

export interface VerificationResult {
  valid: boolean;
  entriesChecked: number;
  firstInvalidSequence?: number;
  error?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// HEALING LOG CLASS
// ═══════════════════════════════════════════════════════════════════════════

export class HealingLog {
  private readonly filePath: string;
  private sequence: number = -1;
  private lastHash: string = GENESIS_HASH;
  private initialized: boolean = false;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath?: string) {
    this.filePath = filePath ?? getHealingLogPath();
  }

  async initialize(): Promise<Result<void, Error>> {
    if (this.initialized) {
      return ok(undefined);
    }

    try {
      const dir = path.dirname(this.filePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
      }

      if (!fs.existsSync(this.filePath)) {
        fs.writeFileSync(this.filePath, '', { mode: 0o600 });
      }

      const lastEntry = this.getLastEntry();
      if (lastEntry !== null) {
        this.sequence = lastEntry.sequence;
        this.lastHash = lastEntry.hash;
      }

      this.initialized = true;
      return ok(undefined);
    } catch (error) {
      return err(error instanceof Error ? error : new Error(String(error)));
    }
  }

  async append(record: HealingRecord): Promise<Result<HealingEntry, Error>> {
    if (!this.initialized) {
      const initResult = await this.initialize();
      if (!initResult.success) {
        return err(initResult.error);
      }
    }

    return new Promise((resolve) => {
      this.writeQueue = this.writeQueue.then(() => {
        try {
          const entryWithoutHash: Omit<HealingEntry, 'hash'> = {
            sequence: this.sequence + 1,
            timestamp: new Date().toISOString(),
            rule: record.rule,
            reason: record.reason,
            config_path: record.configPath,
            directives: [...record.directives],
            prev_hash: this.lastHash,
          };

          const entry: HealingEntry = { ...entryWithoutHash, hash: computeHash(entryWithoutHash) };

          fs.appendFileSync(this.filePath, JSON.stringify(entry) + '\n', { encoding: 'utf-8' });

          this.sequence = entry.sequence;
          this.lastHash = entry.hash;

          healLogger.debug({ sequence: entry.sequence, rule: entry.rule }, 'Healing entry appended');
          resolve(ok(entry));
        } catch (error) {
          resolve(err(error instanceof Error ? error : new Error(String(error))));
        }
      });
    });
  }

  getLastEntry(): HealingEntry | null {
    if (!fs.existsSync(this.filePath)) {
      return null;
    }

    const content = fs.readFileSync(this.filePath, 'utf-8').trim();
    if (content === '') {
      return null;
    }

    const lines = content.split('\n');
    const lastLine = lines[lines.length - 1];
    return lastLine ? parseLine(lastLine) : null;
  }

  async list(options: { rule?: string; limit?: number } = {}): Promise<HealingEntry[]> {
    const entries: HealingEntry[] = [];
    if (!fs.existsSync(this.filePath)) {
      return entries;
    }

    const rl = readline.createInterface({
      input: fs.createReadStream(this.filePath),
      crlfDelay: Infinity,
    });

    const limit = options.limit ?? Infinity;
    for await (const line of rl) {
      if (line.trim() === '') continue;
      const entry = parseLine(line);
      if (entry === null) continue;
      if (options.rule !== undefined && entry.rule !== options.rule) continue;

      entries.push(entry);
      if (entries.length >= limit) {
        rl.close();
        break;
      }
    }

    return entries;
  }

  async verify(): Promise<VerificationResult> {
    if (!fs.existsSync(this.filePath)) {
      return { valid: true, entriesChecked: 0 };
    }

    const rl = readline.createInterface({
      input: fs.createReadStream(this.filePath),
      crlfDelay: Infinity,
    });

    let expectedSequence = 0;
    let expectedPrevHash = GENESIS_HASH;
    let entriesChecked = 0;

    for await (const line of rl) {
      if (line.trim() === '') continue;

      const entry = parseLine(line);
      if (entry === null) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: expectedSequence,
          error: `Parse error at sequence ${expectedSequence}`,
        };
      }

      if (entry.sequence !== expectedSequence) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: entry.sequence,
          error: `Sequence mismatch: expected ${expectedSequence}, got ${entry.sequence}`,
        };
      }

      if (entry.prev_hash !== expectedPrevHash) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: entry.sequence,
          error: `Hash chain broken at sequence ${entry.sequence}`,
        };
      }

      const { hash, ...entryWithoutHash } = entry;
      if (hash !== computeHash(entryWithoutHash)) {
        rl.close();
        return {
          valid: false,
          entriesChecked,
          firstInvalidSequence: entry.sequence,
          error: `Hash verification failed at sequence ${entry.sequence}`,
        };
      }

      expectedSequence++;
      expectedPrevHash = entry.hash;
      entriesChecked++;
    }

    return { valid: true, entriesChecked };
  }

  getSequence(): number {
    return this.sequence;
  }

  getFilePath(): string {
    return this.filePath;
  }
}
