/**
 * Static SQL checks. No parsing and no model call: plain text tests that run
 * before any statement is sent anywhere.
 *
 * The keyword test is a substring match on the uppercased statement, so an
 * identifier such as `created_at` is rejected too. False rejections are
 * preferred over letting a write through.
 */

export const FORBIDDEN_KEYWORDS = ['DROP', 'DELETE', 'INSERT', 'UPDATE', 'ALTER', 'CREATE', 'TRUNCATE'] as const;

export type ForbiddenKeyword = (typeof FORBIDDEN_KEYWORDS)[number];

export type StaticCheckResult =
  | { safe: true }
  | { safe: false; reason: string; keyword?: ForbiddenKeyword };

export function startsWithSelect(sql: string): boolean {
  return sql.trim().toUpperCase().startsWith('SELECT');
}

export function hasBalancedParentheses(sql: string): boolean {
  let open = 0;
  let close = 0;
  for (const ch of sql) {
    if (ch === '(') open++;
    else if (ch === ')') close++;
  }
  return open === close;
}

/**
 * Check order matters: forbidden keywords first, then the SELECT prefix, then
 * parentheses. The first failure wins.
 */
export function checkStatic(sql: string): StaticCheckResult {
  const upper = sql.trim().toUpperCase();

  for (const keyword of FORBIDDEN_KEYWORDS) {
    if (upper.includes(keyword)) {
      return {
        safe: false,
        keyword,
        reason: `Dangerous operation detected: ${keyword}. Only SELECT queries are allowed.`,
      };
    }
  }

  if (!upper.startsWith('SELECT')) {
    return { safe: false, reason: 'Only SELECT queries are allowed.' };
  }

  if (!hasBalancedParentheses(sql)) {
    return { safe: false, reason: 'Mismatched parentheses in SQL query.' };
  }

  return { safe: true };
}
