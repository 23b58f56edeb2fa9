const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DISPLAY_FORMAT = new Intl.DateTimeFormat('en-US', {
  year: 'numeric',
  month: 'long',
  day: 'numeric',
  timeZone: 'UTC',
});

export interface FormattedDate {
  /** 機械可読（yyyy-MM-dd） */
  datetime: string;
  /** 表示用（MMMM d, yyyy） */
  display: string;
}

/**
 * yyyy-MM-dd 形式の文字列をUTCの日付として解析
 * @returns 形式が不正・存在しない日付の場合はnull
 */
export function parseIsoDate(value: string): Date | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  // 2024-02-30 のような繰り上がりを弾く
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    return null;
  }

  return date;
}

export function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/**
 * 日付を datetime 属性値と表示用文字列に整形（UTC基準）
 */
export function formatDate(date: Date | string): FormattedDate {
  const value = typeof date === 'string' ? parseIsoDate(date) : date;
  if (!isValidDate(value)) {
    throw new RangeError(`Invalid date: ${String(date)}`);
  }

  return {
    datetime: value.toISOString().slice(0, 10),
    display: DISPLAY_FORMAT.format(value),
  };
}
