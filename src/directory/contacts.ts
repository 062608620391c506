/**
 * Contact Directory: immutable name -> email lookup, loaded once at startup.
 */

import * as fs from "fs";
import { z } from "zod";

const contactsFileSchema = z.record(z.string().min(1), z.string().email());

export class ContactDirectory {
  private readonly entries: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string>) {
    this.entries = new Map(Object.entries(entries));
  }

  static fromFile(filePath: string): ContactDirectory {
    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return new ContactDirectory(contactsFileSchema.parse(raw));
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  emailFor(name: string): string | undefined {
    return this.entries.get(name);
  }

  /**
   * Resolve a candidate to the directory's canonical spelling.
   * Exact match first, then case-insensitive on trimmed text.
   */
  match(candidate: string): string | undefined {
    const trimmed = candidate.trim();
    if (this.entries.has(trimmed)) return trimmed;
    const lower = trimmed.toLowerCase();
    return this.names().find((n) => n.toLowerCase() === lower);
  }
}
