import { certificates, uploadedFiles } from "@shared/schema";
import type { CertificateRecord, CertificateStatus, InsertUploadedFile, UploadedFile } from "@shared/schema";
import { getDb, eq, and, desc } from "../base";
import type { SQLCondition } from "../base";
import type {
  CertificateListFilter,
  CertificateUpdate,
  NewCertificateRecord,
  UpdateOutcome,
} from "../interfaces";

export class CertificatesStorage {
  async createCertificate(record: NewCertificateRecord): Promise<string> {
    const [created] = await getDb()
      .insert(certificates)
      .values(record)
      .returning({ certId: certificates.certId });
    return created.certId;
  }

  async updateCertificate(
    certId: string,
    fields: CertificateUpdate,
    expectedStatus: CertificateStatus
  ): Promise<UpdateOutcome> {
    const db = getDb();
    const [updated] = await db
      .update(certificates)
      .set({ ...fields, updatedAt: new Date() })
      .where(and(eq(certificates.certId, certId), eq(certificates.status, expectedStatus)))
      .returning();
    if (updated) {
      return { ok: true, record: updated };
    }

    const [existing] = await db
      .select({ certId: certificates.certId })
      .from(certificates)
      .where(eq(certificates.certId, certId));
    return { ok: false, reason: existing ? "conflict" : "not_found" };
  }

  async getCertificate(certId: string): Promise<CertificateRecord | undefined> {
    const [record] = await getDb().select().from(certificates).where(eq(certificates.certId, certId));
    return record;
  }

  async deleteCertificate(certId: string): Promise<boolean> {
    const deleted = await getDb()
      .delete(certificates)
      .where(eq(certificates.certId, certId))
      .returning({ certId: certificates.certId });
    return deleted.length > 0;
  }

  async listCertificates(filter: CertificateListFilter = {}): Promise<CertificateRecord[]> {
    const conditions: SQLCondition[] = [];
    if (filter.submitterAccountId) {
      conditions.push(eq(certificates.submitterAccountId, filter.submitterAccountId));
    }
    if (filter.status) {
      conditions.push(eq(certificates.status, filter.status));
    }
    return getDb()
      .select()
      .from(certificates)
      .where(and(...conditions))
      .orderBy(desc(certificates.createdAt));
  }

  async createUploadedFile(file: InsertUploadedFile): Promise<UploadedFile> {
    const [created] = await getDb().insert(uploadedFiles).values(file).returning();
    return created;
  }

  async getUploadedFile(fileId: string): Promise<UploadedFile | undefined> {
    const [file] = await getDb().select().from(uploadedFiles).where(eq(uploadedFiles.fileId, fileId));
    return file;
  }

  async deleteUploadedFile(fileId: string): Promise<boolean> {
    const deleted = await getDb()
      .delete(uploadedFiles)
      .where(eq(uploadedFiles.fileId, fileId))
      .returning({ fileId: uploadedFiles.fileId });
    return deleted.length > 0;
  }
}
