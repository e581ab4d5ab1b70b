import { format, isValid, parse } from 'date-fns';

export const CERTIFICATE_FIELD_NAMES = [
  'department',
  'competitionName',
  'studentId',
  'studentName',
  'awardCategory',
  'awardLevel',
  'competitionType',
  'organizer',
  'awardDate',
  'advisor',
] as const;

export type CertificateFieldName = typeof CERTIFICATE_FIELD_NAMES[number];

export type CertificateFields = Record<CertificateFieldName, string | null>;

export const CERTIFICATE_FIELD_LABELS: Record<CertificateFieldName, string> = {
  department: '学生所在学院',
  competitionName: '竞赛项目',
  studentId: '学号',
  studentName: '学生姓名',
  awardCategory: '获奖类别',
  awardLevel: '获奖等级',
  competitionType: '竞赛类型',
  organizer: '主办单位',
  awardDate: '获奖时间',
  advisor: '指导教师',
};

// Keys used in the recognition prompt and expected back in its JSON reply.
export const EXTRACTION_KEYS: Record<CertificateFieldName, string> = {
  department: 'department',
  competitionName: 'competition_name',
  studentId: 'student_id',
  studentName: 'student_name',
  awardCategory: 'award_category',
  awardLevel: 'award_level',
  competitionType: 'competition_type',
  organizer: 'organizer',
  awardDate: 'award_date',
  advisor: 'advisor',
};

export const AWARD_CATEGORIES = ['国家级', '省级'] as const;
export const AWARD_LEVELS = ['一等奖', '二等奖', '三等奖', '金奖', '银奖', '铜奖', '优秀奖'] as const;
export const COMPETITION_TYPES = ['A类', 'B类'] as const;

export const FIELD_OPTIONS: Partial<Record<CertificateFieldName, readonly string[]>> = {
  awardCategory: AWARD_CATEGORIES,
  awardLevel: AWARD_LEVELS,
  competitionType: COMPETITION_TYPES,
};

export const REQUIRED_BEFORE_SUBMIT: readonly CertificateFieldName[] = [
  'studentId',
  'studentName',
  'advisor',
  'competitionName',
];

export const STUDENT_ID_PATTERN = /^\d{13}$/;
export const TEACHER_ID_PATTERN = /^\d{8}$/;

export function isValidStudentId(value: string): boolean {
  return STUDENT_ID_PATTERN.test(value);
}

export function isValidTeacherId(value: string): boolean {
  return TEACHER_ID_PATTERN.test(value);
}

export function emptyCertificateFields(): CertificateFields {
  return {
    department: null,
    competitionName: null,
    studentId: null,
    studentName: null,
    awardCategory: null,
    awardLevel: null,
    competitionType: null,
    organizer: null,
    awardDate: null,
    advisor: null,
  };
}

export function pickCertificateFields(source: CertificateFields): CertificateFields {
  const fields = emptyCertificateFields();
  for (const name of CERTIFICATE_FIELD_NAMES) {
    fields[name] = source[name];
  }
  return fields;
}

const AWARD_DATE_FORMATS = ['yyyy-M-d', 'yyyy/M/d', 'yyyy年M月d日', 'yyyy.M.d', 'yyyyMMdd'];
const REFERENCE_DATE = new Date(2000, 0, 1);

/** Returns `YYYY-MM-DD`, or null when no accepted format matches. */
export function normalizeAwardDate(raw: string): string | null {
  const value = raw.trim();
  for (const pattern of AWARD_DATE_FORMATS) {
    const parsed = parse(value, pattern, REFERENCE_DATE);
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

export type FieldValueCheck =
  | { ok: true; value: string }
  | { ok: false; reason: string };

export function checkFieldValue(name: CertificateFieldName, raw: string): FieldValueCheck {
  const value = raw.trim();
  if (!value) {
    return { ok: false, reason: `${CERTIFICATE_FIELD_LABELS[name]} is empty` };
  }

  if (name === 'studentId' && !isValidStudentId(value)) {
    return { ok: false, reason: `studentId must be 13 digits, got "${value}"` };
  }

  if (name === 'awardDate') {
    const date = normalizeAwardDate(value);
    return date
      ? { ok: true, value: date }
      : { ok: false, reason: `awardDate "${value}" is not a recognised date` };
  }

  const options = FIELD_OPTIONS[name];
  if (options && !options.includes(value)) {
    return { ok: false, reason: `${name} must be one of ${options.join('/')}, got "${value}"` };
  }

  return { ok: true, value };
}
