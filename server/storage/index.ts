import type { CertificateRecord, CertificateStatus, InsertUploadedFile, UploadedFile } from "@shared/schema";
import type { AppConfig } from "../config";
import { isDatabaseAvailable } from "../db";
import { AccountsStorage } from "./domains/accounts.storage";
import { CertificatesStorage } from "./domains/certificates.storage";
import { ConfigurationStorage } from "./domains/configuration.storage";
import type {
  CertificateListFilter,
  CertificateUpdate,
  FileStore,
  IdentityDirectory,
  NewCertificateRecord,
  PersistenceGateway,
  UpdateOutcome,
} from "./interfaces";
import { MemoryIdentityDirectory, MemoryStorage } from "./memory.storage";
import { LocalFileStore } from "./providers/local";

export * from "./interfaces";

/** PostgreSQL-backed gateway composed from the domain stores. */
export class DatabaseStorage implements PersistenceGateway {
  private certificatesStorage = new CertificatesStorage();
  private configurationStorage = new ConfigurationStorage();

  createCertificate(record: NewCertificateRecord): Promise<string> {
    return this.certificatesStorage.createCertificate(record);
  }

  updateCertificate(certId: string, fields: CertificateUpdate, expectedStatus: CertificateStatus): Promise<UpdateOutcome> {
    return this.certificatesStorage.updateCertificate(certId, fields, expectedStatus);
  }

  getCertificate(certId: string): Promise<CertificateRecord | undefined> {
    return this.certificatesStorage.getCertificate(certId);
  }

  deleteCertificate(certId: string): Promise<boolean> {
    return this.certificatesStorage.deleteCertificate(certId);
  }

  listCertificates(filter?: CertificateListFilter): Promise<CertificateRecord[]> {
    return this.certificatesStorage.listCertificates(filter);
  }

  createUploadedFile(file: InsertUploadedFile): Promise<UploadedFile> {
    return this.certificatesStorage.createUploadedFile(file);
  }

  getUploadedFile(fileId: string): Promise<UploadedFile | undefined> {
    return this.certificatesStorage.getUploadedFile(fileId);
  }

  deleteUploadedFile(fileId: string): Promise<boolean> {
    return this.certificatesStorage.deleteUploadedFile(fileId);
  }

  getDeadline(): Promise<Date | null> {
    return this.configurationStorage.getDeadline();
  }

  setDeadline(deadline: Date | null, updatedBy: string): Promise<void> {
    return this.configurationStorage.setDeadline(deadline, updatedBy);
  }
}

export interface StorageBundle {
  gateway: PersistenceGateway;
  identities: IdentityDirectory;
  files: FileStore;
}

export function createStorage(appConfig: AppConfig): StorageBundle {
  const files = new LocalFileStore(appConfig.LOCAL_STORAGE_PATH);
  if (isDatabaseAvailable()) {
    return { gateway: new DatabaseStorage(), identities: new AccountsStorage(), files };
  }
  return { gateway: new MemoryStorage(), identities: new MemoryIdentityDirectory(), files };
}
