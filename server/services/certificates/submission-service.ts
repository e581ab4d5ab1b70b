import type { CertificateEdits, CertificateRecord, CertificateStatus, Identity } from '@shared/schema';
import type { CertificateFieldName, CertificateFields } from '@shared/certificate-fields';
import { ForbiddenError, NotFoundError, StateError, UnauthorizedError } from '../../errors';
import { submissionLogger } from '../../logger';
import type { IdentityDirectory, PersistenceGateway } from '../../storage/interfaces';
import { KeyedLock } from '../../utils/keyed-lock';
import { reconcile } from './field-reconciler';
import { toStateError, transition, type SubmissionCommand, type SubmissionState, type TransitionContext } from './submission-state';

export interface SubmissionServiceDeps {
  gateway: PersistenceGateway;
  identities: IdentityDirectory;
  now?: () => Date;
  lock?: KeyedLock;
}

export interface DraftResult {
  record: CertificateRecord;
  missingRequired: CertificateFieldName[];
  suggestions: Partial<CertificateFields>;
  notes: string[];
}

export class SubmissionService {
  private readonly gateway: PersistenceGateway;
  private readonly identities: IdentityDirectory;
  private readonly now: () => Date;
  private readonly lock: KeyedLock;

  constructor(deps: SubmissionServiceDeps) {
    this.gateway = deps.gateway;
    this.identities = deps.identities;
    this.now = deps.now ?? (() => new Date());
    this.lock = deps.lock ?? new KeyedLock();
  }

  async resolveIdentity(accountId: string): Promise<Identity> {
    const identity = await this.identities.getIdentity(accountId);
    if (!identity) {
      throw new UnauthorizedError(`Unknown account ${accountId}`);
    }
    return identity;
  }

  /** Reads the deadline fresh; never cached between calls. */
  async transitionContext(): Promise<TransitionContext> {
    return { now: this.now(), deadline: await this.gateway.getDeadline() };
  }

  async getDeadline(): Promise<Date | null> {
    return this.gateway.getDeadline();
  }

  async setDeadline(identity: Identity, deadline: Date | null): Promise<Date | null> {
    this.requireAdmin(identity);
    await this.gateway.setDeadline(deadline, identity.accountId);
    submissionLogger.info({ deadline: deadline?.toISOString() ?? null, updatedBy: identity.accountId }, 'Submission deadline updated');
    return this.gateway.getDeadline();
  }

  async getCertificate(identity: Identity, certId: string): Promise<CertificateRecord> {
    const record = await this.gateway.getCertificate(certId);
    if (!record || (identity.role !== 'admin' && record.submitterAccountId !== identity.accountId)) {
      throw new NotFoundError('Certificate');
    }
    return record;
  }

  async listCertificates(identity: Identity, filter: { status?: CertificateStatus } = {}): Promise<CertificateRecord[]> {
    return this.gateway.listCertificates({
      status: filter.status,
      submitterAccountId: identity.role === 'admin' ? undefined : identity.accountId,
    });
  }

  async saveDraft(identity: Identity, certId: string, edits: CertificateEdits = {}): Promise<DraftResult> {
    return this.lock.run(certId, async () => {
      const record = await this.getOwnRecord(identity, certId);
      const command: SubmissionCommand = Object.keys(edits).length > 0 ? { type: 'edit' } : { type: 'save' };
      this.ensure(record.status, command, await this.transitionContext());

      const reconciled = reconcile({ extraction: null, identity, priorDraft: record, edits });
      const updated = await this.applyUpdate(certId, pickDraftColumns(reconciled.draft), 'draft');

      submissionLogger.info({ certId, accountId: identity.accountId, edited: Object.keys(edits) }, 'Draft saved');
      return { record: updated, missingRequired: reconciled.missingRequired, suggestions: reconciled.suggestions, notes: reconciled.notes };
    });
  }

  async submit(identity: Identity, certId: string, edits: CertificateEdits = {}): Promise<DraftResult> {
    return this.lock.run(certId, async () => {
      const record = await this.getOwnRecord(identity, certId);
      const context = await this.transitionContext();

      // State and deadline are checked before field validation.
      this.ensure(record.status, { type: 'submit', missingRequired: [] }, context);
      const reconciled = reconcile({ extraction: null, identity, priorDraft: record, edits });
      const result = this.ensure(record.status, { type: 'submit', missingRequired: reconciled.missingRequired }, context);

      const updated = await this.applyUpdate(certId, {
        ...pickDraftColumns(reconciled.draft),
        status: 'submitted',
        submittedAt: result.submittedAt ?? context.now,
      }, 'draft');

      submissionLogger.info({ certId, accountId: identity.accountId }, 'Certificate submitted');
      return { record: updated, missingRequired: [], suggestions: reconciled.suggestions, notes: reconciled.notes };
    });
  }

  async discard(identity: Identity, certId: string): Promise<void> {
    await this.lock.run(certId, async () => {
      const record = await this.getOwnRecord(identity, certId);
      this.ensure(record.status, { type: 'discard' }, await this.transitionContext());
      await this.deleteRecord(certId);
      submissionLogger.info({ certId, accountId: identity.accountId }, 'Draft discarded');
    });
  }

  async adminDelete(identity: Identity, certId: string): Promise<void> {
    this.requireAdmin(identity);
    await this.lock.run(certId, async () => {
      const record = await this.gateway.getCertificate(certId);
      if (!record) throw new NotFoundError('Certificate');
      this.ensure(record.status, { type: 'adminDelete' }, await this.transitionContext());
      await this.deleteRecord(certId);
      submissionLogger.warn({ certId, status: record.status, deletedBy: identity.accountId }, 'Certificate deleted by administrator');
    });
  }

  private requireAdmin(identity: Identity): void {
    if (identity.role !== 'admin') {
      throw new ForbiddenError('Administrator role required');
    }
  }

  private async getOwnRecord(identity: Identity, certId: string): Promise<CertificateRecord> {
    const record = await this.gateway.getCertificate(certId);
    if (!record || record.submitterAccountId !== identity.accountId) {
      throw new NotFoundError('Certificate');
    }
    return record;
  }

  private ensure(state: SubmissionState, command: SubmissionCommand, context: TransitionContext) {
    const result = transition(state, command, context);
    if (!result.ok) {
      submissionLogger.info({ command: command.type, ...result.rejection }, 'Transition rejected');
      throw toStateError(result.rejection);
    }
    return result;
  }

  private async applyUpdate(
    certId: string,
    fields: Parameters<PersistenceGateway['updateCertificate']>[1],
    expectedStatus: CertificateStatus
  ): Promise<CertificateRecord> {
    const outcome = await this.gateway.updateCertificate(certId, fields, expectedStatus);
    if (outcome.ok) return outcome.record;
    if (outcome.reason === 'not_found') throw new NotFoundError('Certificate');
    const current = await this.gateway.getCertificate(certId);
    throw new StateError('CONFLICT', 'The certificate changed status while this request was in progress', {
      currentStatus: current?.status ?? null,
    });
  }

  private async deleteRecord(certId: string): Promise<void> {
    const deleted = await this.gateway.deleteCertificate(certId);
    if (!deleted) throw new NotFoundError('Certificate');
  }
}

function pickDraftColumns(draft: ReturnType<typeof reconcile>['draft']) {
  return {
    department: draft.department,
    competitionName: draft.competitionName,
    studentId: draft.studentId,
    studentName: draft.studentName,
    awardCategory: draft.awardCategory,
    awardLevel: draft.awardLevel,
    competitionType: draft.competitionType,
    organizer: draft.organizer,
    awardDate: draft.awardDate,
    advisor: draft.advisor,
    advisorAccountId: draft.advisorAccountId,
    confirmedFields: draft.confirmedFields,
  };
}
