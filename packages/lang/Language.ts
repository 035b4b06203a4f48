/** A language known to the translation service, identified by its ISO code. */
export class Language {
  /** Sentinel asking the service to detect the source language. */
  static readonly auto: Language = new Language('Automatic', 'auto');

  constructor(
    readonly fullName: string,
    readonly iso639: string,
  ) {}

  /** Languages are equal when their ISO codes match, ignoring case. */
  equals(other: Language | undefined): boolean {
    return !!other && this.iso639.toLowerCase() === other.iso639.toLowerCase();
  }

  toString(): string {
    return `${this.fullName} (${this.iso639})`;
  }
}
