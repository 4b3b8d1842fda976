/**
 * Pulls the SQL statement out of a free-form completion.
 *
 * A response is classified into exactly one of three shapes and each shape has
 * a single extraction rule:
 *
 * - `tagged-fence`: a fence opened with a `sql` tag; the statement is the text
 *   between that fence and the next one.
 * - `untagged-fence`: any other fence; the statement is the first fenced block,
 *   minus a leftover language tag line (`sql`, `sqlite`, `postgresql`, ...).
 * - `raw`: no fence at all; the trimmed response is the statement.
 *
 * Nothing here parses SQL. A bad extraction surfaces when the statement runs.
 */

export type ResponseShape =
  | { kind: 'tagged-fence'; body: string }
  | { kind: 'untagged-fence'; body: string }
  | { kind: 'raw'; body: string };

const FENCE = '```';
const TAGGED_FENCE = /```sql(?![A-Za-z0-9_])/i;
const LEFTOVER_TAG = /^(?:sql|sqlite3?|postgres(?:ql)?|psql|pgsql|plsql|tsql|mssql|mysql|mariadb|oracle)[ \t]*\r?\n/i;

function blockFrom(text: string, start: number): string {
  const end = text.indexOf(FENCE, start);
  return end === -1 ? text.slice(start) : text.slice(start, end);
}

export function classifyResponse(response: string): ResponseShape {
  const text = response.trim();

  const tagged = TAGGED_FENCE.exec(text);
  if (tagged) {
    return { kind: 'tagged-fence', body: blockFrom(text, tagged.index + tagged[0].length) };
  }

  const open = text.indexOf(FENCE);
  if (open !== -1) {
    return { kind: 'untagged-fence', body: blockFrom(text, open + FENCE.length) };
  }

  return { kind: 'raw', body: text };
}

export function stripLeftoverTag(content: string): string {
  return LEFTOVER_TAG.test(content) ? content.replace(LEFTOVER_TAG, '').trim() : content;
}

export function extractSql(response: string): string {
  const shape = classifyResponse(response);
  switch (shape.kind) {
    case 'tagged-fence':
      return shape.body.trim();
    case 'untagged-fence':
      return stripLeftoverTag(shape.body.trim());
    case 'raw':
      return shape.body;
  }
}
