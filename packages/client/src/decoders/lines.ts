/**
 * 行トークナイザ
 * 上流のテキストは厳密な文法を持たないため、1行ずつ
 * 見出し・ラベル付き項目・その他のいずれかに分類する
 */

export type LineToken =
  | { kind: 'header'; text: string }
  | { kind: 'field'; label: string; key: string; value: string }
  | { kind: 'unrecognized'; text: string };

// 行頭の装飾（絵文字や文字化けしたグリフ）は最初の英数字より前の部分として扱う
const CONTENT_START = /[A-Za-z0-9]/;
const FIELD_PATTERN = /^([A-Za-z][A-Za-z ]*?)\s*:\s*(.+)$/;

export function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function classifyLine(line: string): LineToken {
  const trimmed = line.trim();
  const start = trimmed.search(CONTENT_START);

  if (start < 0) {
    return { kind: 'unrecognized', text: trimmed };
  }

  const body = trimmed.slice(start);
  const field = FIELD_PATTERN.exec(body);

  if (field) {
    const label = field[1].trim();
    return { kind: 'field', label, key: normalizeLabel(label), value: field[2].trim() };
  }

  if (body.endsWith(':')) {
    return { kind: 'header', text: body.slice(0, -1).trim() };
  }

  return { kind: 'unrecognized', text: body };
}

/**
 * 空行を除いた各行を分類する
 */
export function tokenize(text: string): LineToken[] {
  return text
    .split(/\r?\n/)
    .filter(line => line.trim() !== '')
    .map(classifyLine);
}
