import { deepFreeze } from '../utils/freeze.ts';

/** Entries grouped by part of speech, restricted to a fixed set of recognised tags. */
export class PartOfSpeechCollection<Tag extends string, Entry> {
  private readonly entries = new Map<Tag, readonly Entry[]>();

  constructor(readonly tags: readonly Tag[]) {}

  /**
   * Recognised tag for a part of speech as the service spells it.
   * Whitespace is stripped, so `auxiliary verb` resolves to `auxiliaryverb`.
   */
  resolve(partOfSpeech: string): Tag | undefined {
    const key = partOfSpeech.replace(/\s+/g, '').toLowerCase();
    return this.tags.find((tag) => tag === key);
  }

  /** Append entries to the tag. Stored entries are frozen. */
  add(tag: Tag, entries: readonly Entry[]): void {
    this.entries.set(tag, deepFreeze([...this.get(tag), ...entries]));
  }

  get(tag: Tag): readonly Entry[] {
    return this.entries.get(tag) ?? [];
  }

  has(tag: Tag): boolean {
    return this.entries.has(tag);
  }

  /** Parts of speech present, in response order. */
  get partsOfSpeech(): Tag[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  [Symbol.iterator](): IterableIterator<[Tag, readonly Entry[]]> {
    return this.entries.entries();
  }

  toJSON(): Partial<Record<Tag, readonly Entry[]>> {
    const json: Partial<Record<Tag, readonly Entry[]>> = {};

    for (const [tag, entries] of this.entries) {
      json[tag] = entries;
    }

    return json;
  }
}
