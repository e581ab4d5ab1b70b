import type {
  CertificateRecord,
  CertificateStatus,
  Identity,
  InsertUploadedFile,
  UploadedFile,
} from "@shared/schema";

export type NewCertificateRecord = Omit<CertificateRecord, "certId" | "updatedAt">;

export type CertificateUpdate = Partial<
  Omit<CertificateRecord, "certId" | "submitterAccountId" | "submitterRole" | "fileId" | "filePath" | "createdAt">
>;

export type UpdateOutcome =
  | { ok: true; record: CertificateRecord }
  | { ok: false; reason: "conflict" | "not_found" };

export interface CertificateListFilter {
  submitterAccountId?: string;
  status?: CertificateStatus;
}

/** Everything the intake core reads or writes. */
export interface PersistenceGateway {
  createCertificate(record: NewCertificateRecord): Promise<string>;
  /** Applies `fields` only while the stored status still equals `expectedStatus`. */
  updateCertificate(certId: string, fields: CertificateUpdate, expectedStatus: CertificateStatus): Promise<UpdateOutcome>;
  getCertificate(certId: string): Promise<CertificateRecord | undefined>;
  deleteCertificate(certId: string): Promise<boolean>;
  listCertificates(filter?: CertificateListFilter): Promise<CertificateRecord[]>;

  createUploadedFile(file: InsertUploadedFile): Promise<UploadedFile>;
  getUploadedFile(fileId: string): Promise<UploadedFile | undefined>;
  deleteUploadedFile(fileId: string): Promise<boolean>;

  getDeadline(): Promise<Date | null>;
  setDeadline(deadline: Date | null, updatedBy: string): Promise<void>;
}

export interface IdentityDirectory {
  getIdentity(accountId: string): Promise<Identity | undefined>;
}

export interface FileStore {
  /** Writes the bytes and returns the path they were stored under. */
  save(key: string, data: Buffer): Promise<string>;
  remove(key: string): Promise<void>;
}
