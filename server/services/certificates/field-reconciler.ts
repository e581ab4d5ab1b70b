import {
  CERTIFICATE_FIELD_NAMES,
  REQUIRED_BEFORE_SUBMIT,
  checkFieldValue,
  emptyCertificateFields,
  isValidStudentId,
  isValidTeacherId,
  pickCertificateFields,
  type CertificateFieldName,
  type CertificateFields,
} from '@shared/certificate-fields';
import type { AccountRole, CertificateEdits, CertificateRecord, ExtractionStatus, Identity } from '@shared/schema';
import { ReconciliationError } from '../../errors';
import type { ExtractionResult } from '../extraction/types';

export type SubmitterRole = Exclude<AccountRole, 'admin'>;

/**
 * Where each field's value may come from for one submitter role.
 * Fields not listed anywhere come from extraction with manual override.
 */
interface AuthorityTable {
  /** Taken from the account; extraction is ignored and edits are rejected. */
  fromIdentity(identity: Identity): Partial<CertificateFields>;
  /** Never filled from extraction; an extracted value is only suggested. */
  manualOnly: readonly CertificateFieldName[];
  /** Used when neither extraction nor the submitter supplies a value. */
  fallbacks(identity: Identity): Partial<CertificateFields>;
  /** The advisor's 8-digit account id, or 'manual' when the submitter supplies it. */
  advisorAccountId(identity: Identity): string | 'manual';
}

const AUTHORITY: Record<SubmitterRole, AuthorityTable> = {
  student: {
    fromIdentity: identity => ({ studentId: identity.accountId, studentName: identity.displayName }),
    manualOnly: ['advisor'],
    fallbacks: identity => ({ department: identity.department || null }),
    advisorAccountId: () => 'manual',
  },
  teacher: {
    fromIdentity: identity => ({ advisor: identity.displayName }),
    manualOnly: [],
    fallbacks: () => ({}),
    advisorAccountId: identity => identity.accountId,
  },
};

export function authorityFor(role: AccountRole): AuthorityTable {
  switch (role) {
    case 'student':
    case 'teacher':
      return AUTHORITY[role];
    case 'admin':
      throw new ReconciliationError(
        'ROLE_NOT_PERMITTED',
        'Administrators cannot submit certificates',
        { role }
      );
  }
}

export interface ReconcileInput {
  /** Null when only the submitter's edits are being applied. */
  extraction: ExtractionResult | null;
  identity: Identity;
  priorDraft?: CertificateRecord;
  edits?: CertificateEdits;
  /** The stored upload; required when there is no prior draft. */
  file?: { fileId: string; storedPath: string };
}

export type ReconciledDraft = CertificateFields & {
  submitterAccountId: string;
  submitterRole: SubmitterRole;
  advisorAccountId: string | null;
  fileId: string;
  filePath: string;
  status: 'draft';
  confirmedFields: CertificateFieldName[];
  extractionStatus: ExtractionStatus | null;
  extractionMethod: string | null;
  extractionConfidence: number | null;
};

export interface ReconcileOutput {
  draft: ReconciledDraft;
  missingRequired: CertificateFieldName[];
  suggestions: Partial<CertificateFields>;
  notes: string[];
}

function assertPriorDraft(priorDraft: CertificateRecord, identity: Identity): void {
  const problems: string[] = [];
  if (priorDraft.status !== 'draft') problems.push(`status is ${priorDraft.status}`);
  if (priorDraft.submitterAccountId !== identity.accountId) problems.push('owned by another account');
  if (priorDraft.submitterRole !== identity.role) problems.push(`created under role ${priorDraft.submitterRole}`);
  if (problems.length > 0) {
    throw new ReconciliationError(
      'MALFORMED_PRIOR_DRAFT',
      `Certificate ${priorDraft.certId} cannot be reconciled: ${problems.join('; ')}`,
      { role: identity.role }
    );
  }
}

interface ValidatedEdits {
  fields: Partial<CertificateFields>;
  advisorAccountId?: string | null;
}

function validateEdits(edits: CertificateEdits, owned: Partial<CertificateFields>, table: AuthorityTable, identity: Identity): ValidatedEdits {
  const conflicts: string[] = [];
  const invalid: string[] = [];
  const reasons: string[] = [];
  const result: ValidatedEdits = { fields: {} };

  for (const name of CERTIFICATE_FIELD_NAMES) {
    const value = edits[name];
    if (value === undefined) continue;

    const ownedValue = owned[name];
    if (ownedValue !== undefined) {
      if ((value ?? null) !== ownedValue) conflicts.push(name);
      continue;
    }

    if (value === null || value.trim() === '') {
      result.fields[name] = null;
      continue;
    }

    const check = checkFieldValue(name, value);
    if (check.ok) {
      result.fields[name] = check.value;
    } else {
      invalid.push(name);
      reasons.push(check.reason);
    }
  }

  if (edits.advisorAccountId !== undefined) {
    const fixed = table.advisorAccountId(identity);
    const value = edits.advisorAccountId === null ? null : edits.advisorAccountId.trim() || null;
    if (fixed !== 'manual') {
      if (value !== fixed) conflicts.push('advisorAccountId');
    } else if (value !== null && !isValidTeacherId(value)) {
      invalid.push('advisorAccountId');
      reasons.push(`advisorAccountId must be 8 digits, got "${value}"`);
    } else {
      result.advisorAccountId = value;
    }
  }

  if (conflicts.length > 0) {
    throw new ReconciliationError(
      'FIELD_AUTHORITY_CONFLICT',
      `${conflicts.join(', ')} ${conflicts.length === 1 ? 'is' : 'are'} taken from the ${identity.role} account and cannot be edited`,
      { fields: conflicts, role: identity.role }
    );
  }
  if (invalid.length > 0) {
    throw new ReconciliationError('INVALID_FIELD_FORMAT', reasons.join('; '), { fields: invalid, role: identity.role });
  }

  return result;
}

/**
 * Merges an extraction with the submitter's account and edits into a draft.
 * Fields the submitter has confirmed are never replaced by extraction.
 */
export function reconcile(input: ReconcileInput): ReconcileOutput {
  const { extraction, identity, priorDraft, edits = {} } = input;
  const table = authorityFor(identity.role);
  const role: SubmitterRole = identity.role === 'teacher' ? 'teacher' : 'student';

  if (priorDraft) {
    assertPriorDraft(priorDraft, identity);
  }

  const file = priorDraft
    ? { fileId: priorDraft.fileId, storedPath: priorDraft.filePath }
    : input.file;
  if (!file) {
    throw new Error('reconcile needs either a prior draft or the stored upload');
  }

  const notes: string[] = [];
  const owned = table.fromIdentity(identity);

  if (owned.studentId !== undefined && (owned.studentId === null || !isValidStudentId(owned.studentId))) {
    throw new ReconciliationError(
      'INVALID_FIELD_FORMAT',
      `Student account id "${identity.accountId}" is not a 13-digit student id`,
      { fields: ['studentId'], role: identity.role }
    );
  }

  const validated = validateEdits(edits, owned, table, identity);
  const base = priorDraft ? pickCertificateFields(priorDraft) : emptyCertificateFields();
  const confirmed = new Set<CertificateFieldName>(priorDraft?.confirmedFields ?? []);
  const extracted = extraction?.fields ?? emptyCertificateFields();
  const fallbacks = table.fallbacks(identity);
  const fields = emptyCertificateFields();
  const suggestions: Partial<CertificateFields> = {};

  for (const name of CERTIFICATE_FIELD_NAMES) {
    const ownedValue = owned[name];
    const editedValue = validated.fields[name];
    const extractedValue = extracted[name];

    if (ownedValue !== undefined) {
      fields[name] = ownedValue;
      if (extractedValue && extractedValue !== ownedValue) {
        notes.push(`${name} "${extractedValue}" on the certificate differs from the account; the account value is used`);
      }
      continue;
    }

    if (editedValue !== undefined) {
      fields[name] = editedValue;
      confirmed.add(name);
      continue;
    }

    fields[name] = base[name];
    if (confirmed.has(name)) {
      continue;
    }

    if (table.manualOnly.includes(name)) {
      if (extractedValue && extractedValue !== fields[name]) {
        suggestions[name] = extractedValue;
      }
      continue;
    }

    if (extractedValue) {
      fields[name] = extractedValue;
    }
  }

  for (const name of CERTIFICATE_FIELD_NAMES) {
    const fallback = fallbacks[name];
    if (fields[name] === null && fallback) {
      fields[name] = fallback;
    }
  }

  let advisorAccountId: string | null;
  const fixedAdvisorId = table.advisorAccountId(identity);
  if (fixedAdvisorId === 'manual') {
    advisorAccountId = validated.advisorAccountId !== undefined
      ? validated.advisorAccountId
      : priorDraft?.advisorAccountId ?? null;
  } else if (isValidTeacherId(fixedAdvisorId)) {
    advisorAccountId = fixedAdvisorId;
  } else {
    advisorAccountId = null;
    notes.push(`teacher account id "${fixedAdvisorId}" is not 8 digits; advisorAccountId left unset`);
  }

  const missingRequired = REQUIRED_BEFORE_SUBMIT.filter(name => !fields[name]);

  return {
    draft: {
      ...fields,
      submitterAccountId: identity.accountId,
      submitterRole: role,
      advisorAccountId,
      fileId: file.fileId,
      filePath: file.storedPath,
      status: 'draft',
      confirmedFields: CERTIFICATE_FIELD_NAMES.filter(name => confirmed.has(name)),
      extractionStatus: extraction?.status ?? priorDraft?.extractionStatus ?? null,
      extractionMethod: extraction?.method ?? priorDraft?.extractionMethod ?? null,
      extractionConfidence: extraction?.confidence ?? priorDraft?.extractionConfidence ?? null,
    },
    missingRequired,
    suggestions,
    notes,
  };
}
