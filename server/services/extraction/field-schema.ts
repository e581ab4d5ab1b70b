import {
  AWARD_CATEGORIES,
  AWARD_LEVELS,
  CERTIFICATE_FIELD_LABELS,
  CERTIFICATE_FIELD_NAMES,
  COMPETITION_TYPES,
  EXTRACTION_KEYS,
  type CertificateFieldName,
} from '@shared/certificate-fields';

const FIELD_HINTS: Partial<Record<CertificateFieldName, string>> = {
  studentId: '13位数字',
  awardCategory: AWARD_CATEGORIES.join('/'),
  awardLevel: AWARD_LEVELS.join('/'),
  competitionType: COMPETITION_TYPES.join('/'),
  awardDate: 'YYYY-MM-DD',
};

function describeField(name: CertificateFieldName, index: number): string {
  const hint = FIELD_HINTS[name];
  return `${index + 1}. ${CERTIFICATE_FIELD_LABELS[name]}${hint ? `（${hint}）` : ''}`;
}

function jsonTemplate(): string {
  const lines = CERTIFICATE_FIELD_NAMES.map(
    name => `  "${EXTRACTION_KEYS[name]}": "${CERTIFICATE_FIELD_LABELS[name]}"`
  );
  return `{\n${lines.join(',\n')}\n}`;
}

export const EXTRACTION_PROMPT = `请仔细分析这张竞赛获奖证书图片，提取以下信息：

${CERTIFICATE_FIELD_NAMES.map(describeField).join('\n')}

按以下JSON格式返回结果，无法识别的字段设置为null：

\`\`\`json
${jsonTemplate()}
\`\`\`

只返回JSON，不要添加其他说明文字。`;

const KEY_TO_FIELD = new Map<string, CertificateFieldName>();
for (const name of CERTIFICATE_FIELD_NAMES) {
  KEY_TO_FIELD.set(EXTRACTION_KEYS[name], name);
  KEY_TO_FIELD.set(name, name);
}

/** Maps a reply key (snake_case or camelCase) to its certificate field. */
export function fieldForReplyKey(key: string): CertificateFieldName | undefined {
  return KEY_TO_FIELD.get(key);
}

// Labelled-line fallback for replies that carry no JSON object.
export const LABELLED_LINE_PATTERNS: Record<CertificateFieldName, RegExp> = {
  department: /学院[：:]\s*([^\n,，]+)/,
  competitionName: /竞赛(?:项目)?(?:名称)?[：:]\s*([^\n,，]+)/,
  studentId: /学号[：:]\s*(\d{13})/,
  studentName: /(?:学生)?姓名[：:]\s*([^\n,，]+)/,
  awardCategory: /(?:获奖)?类别[：:]\s*(国家级|省级)/,
  awardLevel: /(?:获奖)?等级[：:]\s*([一二三]等奖|[金银铜]奖|优秀奖)/,
  competitionType: /(?:竞赛)?类型[：:]\s*([AB]类)/,
  organizer: /主办(?:单位)?[：:]\s*([^\n,，]+)/,
  awardDate: /(?:获奖)?(?:时间|日期)[：:]\s*(\d{4}[年\-/.]\d{1,2}[月\-/.]\d{1,2}日?)/,
  advisor: /指导(?:教师|老师)[：:]\s*([^\n,，]+)/,
};
