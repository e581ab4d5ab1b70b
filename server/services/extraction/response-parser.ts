import { z } from 'zod';
import {
  CERTIFICATE_FIELD_NAMES,
  checkFieldValue,
  emptyCertificateFields,
  type CertificateFieldName,
  type CertificateFields,
} from '@shared/certificate-fields';
import type { ExtractionStatus } from '@shared/schema';
import { fieldForReplyKey, LABELLED_LINE_PATTERNS } from './field-schema';

const MAX_RAW_NOTE_LENGTH = 2000;

const ABSENT_MARKERS = new Set(['', 'null', 'none', 'n/a', '-', '无', '未知', '未识别', '无法识别']);

const replyValueSchema = z
  .union([z.string(), z.number().finite()])
  .transform(value => String(value).trim());

const replyObjectSchema = z.record(z.unknown());

export interface ParsedReply {
  fields: CertificateFields;
  notes: string[];
  method: 'json' | 'pattern';
  anomalies: number;
}

function tryParseJson(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

/** Finds the first JSON object in a reply, fenced or bare. */
export function extractJsonObject(text: string): Record<string, unknown> | undefined {
  const candidates: string[] = [];
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenced) candidates.push(fenced[1]);
  const bare = text.match(/\{[\s\S]*\}/);
  if (bare) candidates.push(bare[0]);

  for (const candidate of candidates) {
    const parsed = replyObjectSchema.safeParse(tryParseJson(candidate));
    if (parsed.success) return parsed.data;
  }
  return undefined;
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

class ReplyCollector {
  readonly fields = emptyCertificateFields();
  readonly notes: string[] = [];
  anomalies = 0;

  accept(field: CertificateFieldName, value: string): void {
    if (ABSENT_MARKERS.has(value.toLowerCase())) return;

    const check = checkFieldValue(field, value);
    if (check.ok) {
      this.fields[field] = check.value;
      return;
    }

    this.anomalies++;
    if (field === 'awardDate') {
      this.fields.awardDate = value;
      this.notes.push(`awardDate kept as extracted: ${check.reason}`);
    } else {
      this.notes.push(`${field} dropped: ${check.reason}`);
    }
  }

  reject(key: string, note: string): void {
    this.anomalies++;
    this.notes.push(`${key}: ${note}`);
  }
}

function parseJsonReply(object: Record<string, unknown>): ParsedReply {
  const collector = new ReplyCollector();
  const unknownKeys: string[] = [];

  for (const [key, value] of Object.entries(object)) {
    const field = fieldForReplyKey(key);
    if (!field) {
      unknownKeys.push(key);
      continue;
    }
    if (value === null || value === undefined) continue;

    const parsed = replyValueSchema.safeParse(value);
    if (!parsed.success) {
      collector.reject(key, `expected a string, got ${describeType(value)}`);
      continue;
    }
    collector.accept(field, parsed.data);
  }

  if (unknownKeys.length > 0) {
    collector.notes.push(`ignored unknown keys: ${unknownKeys.join(', ')}`);
  }

  return { fields: collector.fields, notes: collector.notes, method: 'json', anomalies: collector.anomalies };
}

function parseLabelledLines(text: string): ParsedReply {
  const collector = new ReplyCollector();

  for (const field of CERTIFICATE_FIELD_NAMES) {
    const match = text.match(LABELLED_LINE_PATTERNS[field]);
    if (match) {
      collector.accept(field, match[1].trim());
    }
  }

  const raw = text.length > MAX_RAW_NOTE_LENGTH ? `${text.slice(0, MAX_RAW_NOTE_LENGTH)}…` : text;
  collector.notes.push('reply contained no JSON object; labelled lines were matched instead');
  collector.notes.push(`raw reply: ${raw}`);

  return { fields: collector.fields, notes: collector.notes, method: 'pattern', anomalies: collector.anomalies + 1 };
}

/** Never throws: anything unusable degrades to unset fields plus notes. */
export function parseRecognitionReply(text: string): ParsedReply {
  const object = extractJsonObject(text);
  return object ? parseJsonReply(object) : parseLabelledLines(text);
}

export function countPopulatedFields(fields: CertificateFields): number {
  return CERTIFICATE_FIELD_NAMES.filter(name => fields[name] !== null).length;
}

export function scoreReply(reply: ParsedReply): { status: ExtractionStatus; confidence: number } {
  const populated = countPopulatedFields(reply.fields);
  const complete = populated === CERTIFICATE_FIELD_NAMES.length && reply.anomalies === 0;
  return {
    status: complete ? 'ok' : 'partial',
    confidence: populated / CERTIFICATE_FIELD_NAMES.length,
  };
}
