/**
 * File-backed record store.
 *
 * Maps entity ids to records held in one flat file per entity type. Every
 * read parses the whole file and every write replaces it atomically.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { RECORD_TERMINATOR, decodeRecord, decodeRow, encodeRow, type RecordCodec } from './codec.js';
import { CorruptRecordError, NotFoundError, ValidationError } from './errors.js';
import { describeIssues } from '../models/index.js';

let tempCounter = 0;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Persistent collection of one entity type.
 *
 * Records are returned as fresh objects; mutating them has no effect on
 * the file until they are passed back through {@link update}.
 */
export class RecordStore<T, TDraft extends object> {
  private readonly codec: RecordCodec<T, TDraft>;
  private readonly filePath: string;

  /**
   * @param codec - Row layout and validation for the entity type
   * @param filePath - Backing file; it and its directory are created on first write
   */
  constructor(codec: RecordCodec<T, TDraft>, filePath: string) {
    this.codec = codec;
    this.filePath = filePath;
  }

  /**
   * Parse every record in the backing file.
   *
   * A missing or empty file holds no records.
   *
   * @throws CorruptRecordError if any line fails to decode
   */
  loadAll(): T[] {
    if (!existsSync(this.filePath)) {
      return [];
    }
    const content = this.readText();
    if (content === '') {
      return [];
    }

    const lines = content.split(RECORD_TERMINATOR);
    const trailing = lines.pop();
    if (trailing !== '') {
      throw this.corrupt(lines.length + 1, 'last row is not newline-terminated');
    }

    const [header, ...rows] = lines;
    const expectedHeader = encodeRow(this.codec.columns);
    if (header !== expectedHeader) {
      throw this.corrupt(1, `expected header "${expectedHeader}"`);
    }

    const records: T[] = [];
    const seen = new Set<number>();
    rows.forEach((line, index) => {
      const lineNumber = index + 2;
      const fields = decodeRow(line);
      if (!fields.ok) {
        throw this.corrupt(lineNumber, fields.reason);
      }
      const record = decodeRecord(this.codec, fields.value);
      if (!record.ok) {
        throw this.corrupt(lineNumber, record.reason);
      }
      const id = this.codec.idOf(record.value);
      if (seen.has(id)) {
        throw this.corrupt(lineNumber, `duplicate id ${id}`);
      }
      seen.add(id);
      records.push(record.value);
    });

    return records;
  }

  /**
   * Find one record by id.
   */
  get(id: number): T | undefined {
    return this.loadAll().find((record) => this.codec.idOf(record) === id);
  }

  /**
   * Store a new record under the next id (highest existing id + 1, or 1).
   *
   * @throws ValidationError if the record would not survive a round-trip
   */
  append(draft: TDraft): T {
    const records = this.loadAll();
    const nextId = records.reduce((max, record) => Math.max(max, this.codec.idOf(record)), 0) + 1;
    const record = this.validate(this.codec.withId(draft, nextId));
    this.writeAll([...records, record]);
    return record;
  }

  /**
   * Replace fields of an existing record. The id is never changed.
   *
   * @throws NotFoundError if no record has the id
   * @throws ValidationError if the patched record is invalid; nothing is written
   */
  update(id: number, patch: Partial<TDraft>): T {
    const records = this.loadAll();
    const index = records.findIndex((record) => this.codec.idOf(record) === id);
    const existing = records[index];
    if (existing === undefined) {
      throw new NotFoundError(this.codec.entity, id);
    }

    const merged: TDraft = { ...this.codec.toDraft(existing), ...patch };
    const record = this.validate(this.codec.withId(merged, id));
    records[index] = record;
    this.writeAll(records);
    return record;
  }

  /**
   * Remove a record.
   *
   * @returns true if a record was removed, false if the id was unknown
   */
  delete(id: number): boolean {
    const records = this.loadAll();
    const remaining = records.filter((record) => this.codec.idOf(record) !== id);
    if (remaining.length === records.length) {
      return false;
    }
    this.writeAll(remaining);
    return true;
  }

  /**
   * Read the backing file as strict UTF-8; undecodable bytes are reported
   * with the line they occur on.
   */
  private readText(): string {
    const bytes = readFileSync(this.filePath);
    const text = decodeUtf8(bytes);
    if (text !== undefined) {
      return text;
    }

    let lineNumber = 1;
    let start = 0;
    while (start < bytes.length) {
      const newline = bytes.indexOf(0x0a, start);
      const end = newline === -1 ? bytes.length : newline;
      if (decodeUtf8(bytes.subarray(start, end)) === undefined) {
        break;
      }
      start = end + 1;
      lineNumber++;
    }
    throw this.corrupt(start < bytes.length ? lineNumber : 1, 'invalid UTF-8 byte sequence');
  }

  private validate(record: T): T {
    const parsed = this.codec.schema.safeParse(record);
    if (!parsed.success) {
      const field = parsed.error.issues[0]?.path[0];
      throw new ValidationError(
        describeIssues(parsed.error),
        typeof field === 'string' ? field : undefined
      );
    }
    const roundTrip = decodeRow(encodeRow(this.codec.toFields(parsed.data)));
    const decoded = roundTrip.ok ? decodeRecord(this.codec, roundTrip.value) : roundTrip;
    if (!decoded.ok) {
      throw new ValidationError(decoded.reason);
    }
    return decoded.value;
  }

  /**
   * Write the full file to a temporary sibling, then rename it over the
   * original so readers see either the old contents or the new ones.
   */
  private writeAll(records: readonly T[]): void {
    const lines = [
      encodeRow(this.codec.columns),
      ...records.map((record) => encodeRow(this.codec.toFields(record))),
    ];
    const content = lines.map((line) => line + RECORD_TERMINATOR).join('');

    mkdirSync(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.${++tempCounter}.tmp`;
    try {
      writeFileSync(tempPath, content, 'utf8');
      renameSync(tempPath, this.filePath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw error;
    }
  }

  private corrupt(lineNumber: number, reason: string): CorruptRecordError {
    return new CorruptRecordError(this.filePath, lineNumber, reason);
  }
}
