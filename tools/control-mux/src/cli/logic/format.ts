import { assistantText, type Message, type ResultMessage } from '../../message-parser.js';

/** Human-readable stdout text for a message; undefined when it prints nothing. */
export function formatMessage(message: Message): string | undefined {
  if (message.type !== 'assistant') return undefined;

  const parts: string[] = [];
  const text = assistantText(message);
  if (text !== '') parts.push(text);
  for (const block of message.content) {
    if (block.type === 'tool_use') parts.push(`[tool: ${block.name}]`);
  }
  return parts.length > 0 ? parts.join('\n') + '\n' : undefined;
}

export function formatResultSummary(result: ResultMessage): string {
  let summary = `Result: ${result.subtype} (turns=${result.numTurns}, duration=${result.durationMs}ms`;
  if (result.totalCostUsd !== undefined) {
    summary += `, cost=$${result.totalCostUsd.toFixed(4)}`;
  }
  return summary + ')';
}
