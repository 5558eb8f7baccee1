/**
 * Whitelist
 *
 * Allow-list of Telegram user IDs, one per line. Anything after `#` is a
 * comment, so entries may carry a note: `123456789 # alice`.
 *
 * @module core/whitelist
 */

import { existsSync, readFileSync, statSync } from 'node:fs';

export const WHITELIST_FILE_NAME = '.whitelist';
export const DEFAULT_WHITELIST_CONTENT = '# Add your Telegram user IDs here\n';

// ============================================================================
// Parsing
// ============================================================================

export interface InvalidEntry {
  /** 1-based line number */
  line: number;
  text: string;
}

export interface ParsedWhitelist {
  ids: Set<number>;
  invalid: InvalidEntry[];
}

/**
 * Strip the comment and surrounding whitespace from one line
 */
function entryOf(line: string): string {
  const hash = line.indexOf('#');
  return (hash === -1 ? line : line.slice(0, hash)).trim();
}

function parseId(entry: string): number | null {
  if (!/^\d+$/.test(entry)) return null;
  const id = Number(entry);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function parseWhitelist(content: string): ParsedWhitelist {
  const ids = new Set<number>();
  const invalid: InvalidEntry[] = [];

  content.split(/\r?\n/).forEach((line, index) => {
    const entry = entryOf(line);
    if (!entry) return;

    const id = parseId(entry);
    if (id === null) {
      invalid.push({ line: index + 1, text: entry });
    } else {
      ids.add(id);
    }
  });

  return { ids, invalid };
}

// ============================================================================
// Editing
// ============================================================================

/**
 * Append an ID. Returns the content unchanged when the ID is already listed.
 */
export function addToWhitelist(content: string, id: number, comment?: string): string {
  if (parseWhitelist(content).ids.has(id)) {
    return content;
  }

  const note = comment?.trim() ? ` # ${comment.trim()}` : '';
  const base = content.length === 0 || content.endsWith('\n') ? content : content + '\n';
  return `${base}${id}${note}\n`;
}

/**
 * Drop every line whose entry is the given ID. Comments and other entries
 * are kept as they are.
 */
export function removeFromWhitelist(content: string, id: number): string {
  const lines = content.split('\n');
  const kept = lines.filter((line) => parseId(entryOf(line)) !== id);
  return kept.join('\n');
}

// ============================================================================
// File-backed store
// ============================================================================

/**
 * Whitelist backed by a file on disk. The file is re-read whenever its
 * modification time changes, so edits apply without restarting the bot.
 */
export class WhitelistStore {
  private ids = new Set<number>();
  private invalid: InvalidEntry[] = [];
  private loadedMtimeMs: number | null = null;

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Re-read the file if it changed since the last load. A missing file is an
   * empty whitelist. Returns true when the contents were (re)loaded.
   */
  refresh(): boolean {
    if (!existsSync(this.filePath)) {
      const changed = this.loadedMtimeMs !== -1;
      this.ids = new Set();
      this.invalid = [];
      this.loadedMtimeMs = -1;
      return changed;
    }

    const mtimeMs = statSync(this.filePath).mtimeMs;
    if (mtimeMs === this.loadedMtimeMs) {
      return false;
    }

    const parsed = parseWhitelist(readFileSync(this.filePath, 'utf-8'));
    this.ids = parsed.ids;
    this.invalid = parsed.invalid;
    this.loadedMtimeMs = mtimeMs;
    return true;
  }

  isAllowed(telegramId: number): boolean {
    this.refresh();
    return this.ids.has(telegramId);
  }

  get size(): number {
    return this.ids.size;
  }

  get invalidEntries(): readonly InvalidEntry[] {
    return this.invalid;
  }

  list(): number[] {
    return [...this.ids].sort((a, b) => a - b);
  }
}
