// packages/core/src/report/format.ts -- Plain text, Markdown and JSON renderings of debates

import { serializeDebate } from '../storage/codec.js';
import type { DebateRecord, DebateRole } from '../types/debate.js';

const RULE_WIDTH = 70;
const HEAVY_RULE = '='.repeat(RULE_WIDTH);
const LIGHT_RULE = '-'.repeat(RULE_WIDTH);

const MARKDOWN_HEADINGS: Record<DebateRole, string> = {
  FOR: 'Affirmative Argument',
  AGAINST: 'Negative Argument',
  SYNTHESIS: 'Synthesis',
};

/** `2025-01-02T03:04:05.678Z` -> `2025-01-02 03:04:05` */
export function formatTimestamp(iso: string): string {
  return iso.replace('T', ' ').slice(0, 19);
}

export function formatMs(ms: number): string {
  return `${ms.toFixed(1)}ms`;
}

export function formatDebateText(debate: DebateRecord): string {
  const lines: string[] = [
    HEAVY_RULE,
    `  DEBATE: ${debate.topic.title}`,
    HEAVY_RULE,
    '',
    'TOPIC DESCRIPTION:',
    debate.topic.description,
    '',
  ];

  debate.agentResponses.forEach((response, i) => {
    lines.push(
      LIGHT_RULE,
      `${i + 1}. ${response.role} ARGUMENT`,
      `Agent: ${response.agentName}`,
      `Model: ${response.modelName}`,
      `Execution Time: ${formatMs(response.executionTimeMs)}`,
    );
    if (!response.success) {
      lines.push(`Error: ${response.errorMessage}`);
    }
    lines.push('', response.responseText, '');
  });

  lines.push(
    LIGHT_RULE,
    'SUMMARY',
    `Total Execution Time: ${formatMs(debate.totalExecutionTimeMs)}`,
    `Created: ${formatTimestamp(debate.createdAt)}`,
    `Debate ID: ${debate.debateId}`,
    HEAVY_RULE,
  );
  return lines.join('\n');
}

export function formatDebateMarkdown(debate: DebateRecord): string {
  const lines: string[] = [
    `# ${debate.topic.title}`,
    '',
    '## Topic Description',
    '',
    debate.topic.description,
    '',
  ];

  debate.agentResponses.forEach((response, i) => {
    lines.push(
      `## ${i + 1}. ${MARKDOWN_HEADINGS[response.role]}`,
      '',
      `**Agent:** ${response.agentName}`,
      '',
      `**Model:** ${response.modelName}`,
      '',
      `**Execution Time:** ${formatMs(response.executionTimeMs)}`,
      '',
    );
    if (!response.success) {
      lines.push(`> **Error:** ${response.errorMessage}`, '');
    }
    lines.push(response.responseText, '');
  });

  lines.push(
    '---',
    '## Metadata',
    '',
    `- **Total Execution Time:** ${formatMs(debate.totalExecutionTimeMs)}`,
    `- **Debate ID:** \`${debate.debateId}\``,
    `- **Created:** ${formatTimestamp(debate.createdAt)}`,
    '',
  );
  return lines.join('\n');
}

export function formatDebateList(debates: readonly DebateRecord[]): string {
  if (debates.length === 0) {
    return 'No debates found.';
  }
  const lines = ['Stored Debates:', ''];
  debates.forEach((debate, i) => {
    lines.push(
      `${i + 1}. ${debate.topic.title}`,
      `   ID: ${debate.debateId}`,
      `   Created: ${formatTimestamp(debate.createdAt)}`,
      `   Agents: ${debate.agentResponses.length}`,
      '',
    );
  });
  return lines.join('\n');
}

/** Same document shape the JSON store writes. */
export function formatDebateJson(debate: DebateRecord): string {
  return serializeDebate(debate);
}

export type DebateFormat = 'text' | 'markdown' | 'json';

export function formatDebate(debate: DebateRecord, format: DebateFormat): string {
  switch (format) {
    case 'markdown':
      return formatDebateMarkdown(debate);
    case 'json':
      return formatDebateJson(debate);
    case 'text':
      return formatDebateText(debate);
  }
}
