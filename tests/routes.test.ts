import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../server/app';
import { BadRequestError } from '../server/errors';
import { decodeUpload } from '../server/routes/certificates.routes';
import {
  ACCOUNT_HEADER,
  ADMIN,
  STUDENT,
  TEACHER,
  createHarness,
  headerIdentityResolver,
  solidImage,
  type Harness,
} from './helpers/fixtures';

describe('decodeUpload', () => {
  it('accepts plain and data-URL base64', () => {
    expect(decodeUpload('aGVsbG8=').toString()).toBe('hello');
    expect(decodeUpload('data:image/png;base64,aGVs\nbG8=').toString()).toBe('hello');
  });

  it('rejects text that is not base64', () => {
    const error = (() => {
      try {
        decodeUpload('not base64!');
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(BadRequestError);
    expect(error).toMatchObject({ status: 400, detail: 'fileBase64 is not valid base64' });
  });
});

describe('HTTP API', () => {
  let harness: Harness;
  let app: Express;
  let png: string;

  beforeEach(async () => {
    harness = createHarness();
    app = createApp({
      config: harness.config,
      services: harness.services,
      resolveIdentity: headerIdentityResolver(harness.identities),
    });
    png = (await solidImage('png', 120, 80)).toString('base64');
  });

  async function ingestAsStudent(): Promise<string> {
    const response = await request(app)
      .post('/api/certificates/ingest')
      .set(ACCOUNT_HEADER, STUDENT.accountId)
      .send({ fileBase64: png, declaredType: 'png', originalName: 'award.png' })
      .expect(201);
    return response.body.certificate.certId;
  }

  describe('health and errors', () => {
    it('reports health without authentication', async () => {
      const response = await request(app).get('/health').expect(200);
      expect(response.body).toMatchObject({ status: 'ok', database: 'in-memory' });
    });

    it('echoes the correlation id', async () => {
      const response = await request(app).get('/api/deadline').set('x-correlation-id', 'trace-123').expect(200);
      expect(response.headers['x-correlation-id']).toBe('trace-123');
    });

    it('answers unknown API routes with a problem document', async () => {
      const response = await request(app).get('/api/nothing-here').expect(404);
      expect(response.body).toMatchObject({
        type: '/errors/not-found',
        status: 404,
        detail: 'Route GET /nothing-here not found',
      });
    });

    it('requires an identity for certificate routes', async () => {
      const response = await request(app).get('/api/certificates').expect(401);
      expect(response.body).toMatchObject({ type: '/errors/unauthorized', title: 'Unauthorized' });
    });

    it('reports malformed JSON as a bad request', async () => {
      const response = await request(app)
        .post('/api/certificates/ingest')
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .set('Content-Type', 'application/json')
        .send('{"fileBase64": ')
        .expect(400);
      expect(response.body.detail).toBe('Malformed JSON body');
    });
  });

  describe('POST /api/certificates/ingest', () => {
    it('creates a draft from an upload', async () => {
      const response = await request(app)
        .post('/api/certificates/ingest')
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ fileBase64: png, declaredType: 'png' })
        .expect(201);

      expect(response.body.certificate).toMatchObject({
        studentId: '2024010101001',
        studentName: '张三',
        advisor: null,
        status: 'draft',
        createdAt: '2025-06-01T08:00:00.000Z',
      });
      expect(response.body.missingRequired).toEqual(['advisor']);
      expect(response.body.suggestions).toEqual({ advisor: '王老师' });
      expect(response.body.extraction).toMatchObject({ status: 'ok', provider: 'stub' });
    });

    it('validates the request body', async () => {
      const response = await request(app)
        .post('/api/certificates/ingest')
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ declaredType: 'png' })
        .expect(400);

      expect(response.body.type).toBe('/errors/validation-error');
      expect(response.body.errors).toEqual([{ path: 'fileBase64', message: 'Required' }]);
    });

    it('maps format errors to 415 with the error code', async () => {
      const response = await request(app)
        .post('/api/certificates/ingest')
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ fileBase64: png, declaredType: 'gif' })
        .expect(415);

      expect(response.body).toMatchObject({
        type: '/errors/format-error',
        code: 'UNSUPPORTED_FORMAT',
        declaredType: 'gif',
      });
    });

    it('refuses administrators', async () => {
      const response = await request(app)
        .post('/api/certificates/ingest')
        .set(ACCOUNT_HEADER, ADMIN.accountId)
        .send({ fileBase64: png, declaredType: 'png' })
        .expect(403);

      expect(response.body).toMatchObject({ code: 'ROLE_NOT_PERMITTED', role: 'admin' });
    });
  });

  describe('draft lifecycle', () => {
    it('saves edits, refuses an incomplete submit, then submits', async () => {
      const certId = await ingestAsStudent();

      const saved = await request(app)
        .patch(`/api/certificates/${certId}`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ edits: { organizer: '教育部' } })
        .expect(200);
      expect(saved.body.certificate.organizer).toBe('教育部');
      expect(saved.body.certificate.confirmedFields).toEqual(['organizer']);

      const incomplete = await request(app)
        .post(`/api/certificates/${certId}/submit`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .expect(422);
      expect(incomplete.body).toMatchObject({
        type: '/errors/state-error',
        code: 'MISSING_REQUIRED_FIELDS',
        fields: ['advisor'],
        currentStatus: 'draft',
        deadline: null,
      });

      const submitted = await request(app)
        .post(`/api/certificates/${certId}/submit`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ edits: { advisor: '王老师' } })
        .expect(200);
      expect(submitted.body.certificate).toMatchObject({
        status: 'submitted',
        advisor: '王老师',
        submittedAt: '2025-06-01T08:00:00.000Z',
      });

      const discard = await request(app)
        .delete(`/api/certificates/${certId}`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .expect(409);
      expect(discard.body.code).toBe('RECORD_IMMUTABLE');
    });

    it('rejects edits to account-owned fields', async () => {
      const certId = await ingestAsStudent();

      const response = await request(app)
        .patch(`/api/certificates/${certId}`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ edits: { studentName: '李四' } })
        .expect(422);
      expect(response.body).toMatchObject({ code: 'FIELD_AUTHORITY_CONFLICT', fields: ['studentName'] });
    });

    it('rejects fields that are not editable', async () => {
      const certId = await ingestAsStudent();

      await request(app)
        .patch(`/api/certificates/${certId}`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ edits: { status: 'submitted' } })
        .expect(400);
    });

    it('lists and reads only the caller\'s certificates', async () => {
      const certId = await ingestAsStudent();

      const mine = await request(app).get('/api/certificates').set(ACCOUNT_HEADER, STUDENT.accountId).expect(200);
      expect(mine.body.total).toBe(1);
      expect(mine.body.data[0].certId).toBe(certId);

      const theirs = await request(app).get('/api/certificates').set(ACCOUNT_HEADER, TEACHER.accountId).expect(200);
      expect(theirs.body).toEqual({ data: [], total: 0 });

      await request(app).get(`/api/certificates/${certId}`).set(ACCOUNT_HEADER, TEACHER.accountId).expect(404);
      await request(app).get(`/api/certificates/${certId}`).set(ACCOUNT_HEADER, ADMIN.accountId).expect(200);
    });

    it('discards a draft', async () => {
      const certId = await ingestAsStudent();

      await request(app).delete(`/api/certificates/${certId}`).set(ACCOUNT_HEADER, STUDENT.accountId).expect(204);
      await request(app).get(`/api/certificates/${certId}`).set(ACCOUNT_HEADER, STUDENT.accountId).expect(404);
    });
  });

  describe('deadline and administration', () => {
    it('lets an administrator set the deadline and closes submissions after it', async () => {
      const certId = await ingestAsStudent();

      await request(app)
        .put('/api/admin/deadline')
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ deadline: '2025-06-30T16:00:00.000Z' })
        .expect(403);

      const set = await request(app)
        .put('/api/admin/deadline')
        .set(ACCOUNT_HEADER, ADMIN.accountId)
        .send({ deadline: '2025-07-01T00:00:00+08:00' })
        .expect(200);
      expect(set.body).toEqual({ deadline: '2025-06-30T16:00:00.000Z' });

      const open = await request(app).get('/api/deadline').expect(200);
      expect(open.body).toEqual({ deadline: '2025-06-30T16:00:00.000Z', passed: false });

      harness.clock.now = new Date('2025-06-30T16:00:01.000Z');
      const closed = await request(app).get('/api/deadline').expect(200);
      expect(closed.body.passed).toBe(true);

      const late = await request(app)
        .patch(`/api/certificates/${certId}`)
        .set(ACCOUNT_HEADER, STUDENT.accountId)
        .send({ edits: { advisor: '王老师' } })
        .expect(403);
      expect(late.body).toMatchObject({ code: 'DEADLINE_PASSED', deadline: '2025-06-30T16:00:00.000Z' });
    });

    it('validates the deadline body', async () => {
      await request(app)
        .put('/api/admin/deadline')
        .set(ACCOUNT_HEADER, ADMIN.accountId)
        .send({ deadline: 'next friday' })
        .expect(400);
    });

    it('lets an administrator delete any certificate', async () => {
      const certId = await ingestAsStudent();

      await request(app).delete(`/api/admin/certificates/${certId}`).set(ACCOUNT_HEADER, TEACHER.accountId).expect(403);
      await request(app).delete(`/api/admin/certificates/${certId}`).set(ACCOUNT_HEADER, ADMIN.accountId).expect(204);
      await request(app).delete(`/api/admin/certificates/${certId}`).set(ACCOUNT_HEADER, ADMIN.accountId).expect(404);
    });
  });
});
