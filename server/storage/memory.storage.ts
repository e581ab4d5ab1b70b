import type { CertificateRecord, CertificateStatus, Identity, InsertUploadedFile, UploadedFile } from "@shared/schema";
import type {
  CertificateListFilter,
  CertificateUpdate,
  FileStore,
  IdentityDirectory,
  NewCertificateRecord,
  PersistenceGateway,
  UpdateOutcome,
} from "./interfaces";

/**
 * Process-local gateway used by tests and by runs without DATABASE_URL.
 * The status compare and the write happen in one synchronous step.
 */
export class MemoryStorage implements PersistenceGateway {
  private certificates = new Map<string, CertificateRecord>();
  private files = new Map<string, UploadedFile>();
  private deadline: Date | null = null;

  async createCertificate(record: NewCertificateRecord): Promise<string> {
    const certId = crypto.randomUUID();
    this.certificates.set(certId, {
      ...record,
      certId,
      confirmedFields: [...record.confirmedFields],
      updatedAt: record.createdAt,
    });
    return certId;
  }

  async updateCertificate(
    certId: string,
    fields: CertificateUpdate,
    expectedStatus: CertificateStatus
  ): Promise<UpdateOutcome> {
    const current = this.certificates.get(certId);
    if (!current) return { ok: false, reason: "not_found" };
    if (current.status !== expectedStatus) return { ok: false, reason: "conflict" };

    const updated: CertificateRecord = { ...current, ...fields, updatedAt: new Date() };
    this.certificates.set(certId, updated);
    return { ok: true, record: { ...updated } };
  }

  async getCertificate(certId: string): Promise<CertificateRecord | undefined> {
    const record = this.certificates.get(certId);
    return record ? { ...record } : undefined;
  }

  async deleteCertificate(certId: string): Promise<boolean> {
    return this.certificates.delete(certId);
  }

  async listCertificates(filter: CertificateListFilter = {}): Promise<CertificateRecord[]> {
    return [...this.certificates.values()]
      .filter(record => !filter.submitterAccountId || record.submitterAccountId === filter.submitterAccountId)
      .filter(record => !filter.status || record.status === filter.status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map(record => ({ ...record }));
  }

  async createUploadedFile(file: InsertUploadedFile): Promise<UploadedFile> {
    const stored: UploadedFile = {
      ...file,
      fileId: file.fileId ?? crypto.randomUUID(),
      uploadTimestamp: file.uploadTimestamp ?? new Date(),
    };
    this.files.set(stored.fileId, stored);
    return { ...stored };
  }

  async getUploadedFile(fileId: string): Promise<UploadedFile | undefined> {
    const file = this.files.get(fileId);
    return file ? { ...file } : undefined;
  }

  async deleteUploadedFile(fileId: string): Promise<boolean> {
    return this.files.delete(fileId);
  }

  async getDeadline(): Promise<Date | null> {
    return this.deadline;
  }

  async setDeadline(deadline: Date | null, _updatedBy: string): Promise<void> {
    this.deadline = deadline;
  }
}

export class MemoryIdentityDirectory implements IdentityDirectory {
  private identities = new Map<string, Identity>();

  constructor(identities: Identity[] = []) {
    for (const identity of identities) {
      this.identities.set(identity.accountId, identity);
    }
  }

  add(identity: Identity): void {
    this.identities.set(identity.accountId, identity);
  }

  async getIdentity(accountId: string): Promise<Identity | undefined> {
    return this.identities.get(accountId);
  }
}

export class MemoryFileStore implements FileStore {
  readonly objects = new Map<string, Buffer>();

  async save(key: string, data: Buffer): Promise<string> {
    this.objects.set(key, Buffer.from(data));
    return `memory://${key}`;
  }

  async remove(key: string): Promise<void> {
    this.objects.delete(key);
  }
}
