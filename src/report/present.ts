import type { AssistantTurn } from '../QueryAssistant.js';
import { TRANSLATION_FAILURE_NOTICE } from '../session/history.js';
import { renderTable } from './table.js';

/** Console rendering of one assistant turn. */
export function formatTurn(turn: AssistantTurn): string {
  const lines: string[] = [];

  if (turn.status === 'failed') {
    if (turn.failure.kind === 'translation') {
      lines.push(TRANSLATION_FAILURE_NOTICE, turn.failure.message);
      return lines.join('\n');
    }
    if (turn.sql) lines.push('--- SQL ---', turn.sql, '');
    lines.push(turn.failure.message);
    return lines.join('\n');
  }

  lines.push('--- SQL ---', turn.sql, '', '--- Results ---');
  const { result } = turn;
  if (!result.hasResultSet) {
    lines.push(`Statement executed (${result.rowsModified} rows modified).`);
  } else if (result.rowCount === 0) {
    lines.push('No results found.');
  } else {
    lines.push(renderTable(result.columns, result.rows));
  }

  if (turn.statistics) {
    lines.push('', '--- Quick Statistics ---', JSON.stringify(turn.statistics, null, 2));
  }
  return lines.join('\n');
}
