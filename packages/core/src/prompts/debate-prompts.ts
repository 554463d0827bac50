// packages/core/src/prompts/debate-prompts.ts

import type { DebateRole, DebateTopic } from '../types/debate.js';

const DELIMITER = '---';

function topicLines(topic: DebateTopic): string[] {
  return [`Topic: ${topic.title}`, `Description: ${topic.description}`];
}

/** Prior response, verbatim, between delimiter lines. */
function quoted(text: string): string[] {
  return [DELIMITER, text, DELIMITER];
}

export function buildForPrompt(topic: DebateTopic): string {
  return [
    'You are arguing in favor of the following topic:',
    '',
    ...topicLines(topic),
    '',
    'Provide a clear, compelling argument in favor of this topic.',
    'Be specific and evidence-based.',
    'Keep your response focused and substantive.',
  ].join('\n');
}

export function buildAgainstPrompt(topic: DebateTopic, forResponse: string): string {
  return [
    'You are arguing against the following topic:',
    '',
    ...topicLines(topic),
    '',
    'The argument in favor of this topic was:',
    ...quoted(forResponse),
    '',
    'Provide a clear, compelling counter-argument against this topic.',
    'Address the points made in the FOR argument.',
    'Be specific and evidence-based.',
    'Keep your response focused and substantive.',
  ].join('\n');
}

export function buildSynthesisPrompt(
  topic: DebateTopic,
  forResponse: string,
  againstResponse: string,
): string {
  return [
    'You are synthesizing a debate on the following topic:',
    '',
    ...topicLines(topic),
    '',
    'ARGUMENT IN FAVOR:',
    ...quoted(forResponse),
    '',
    'ARGUMENT AGAINST:',
    ...quoted(againstResponse),
    '',
    'Provide a balanced synthesis that:',
    '1. Acknowledges the strengths of both arguments',
    '2. Identifies the weaknesses in both arguments',
    '3. Synthesizes a nuanced perspective that considers both viewpoints',
    '4. Offers insights on how to resolve the tensions between the two positions',
    '',
    'Keep your synthesis thoughtful and balanced.',
  ].join('\n');
}

/**
 * Prompt for `role` given the texts of the stages before it,
 * in execution order. Missing prior texts are treated as empty.
 */
export function buildStagePrompt(
  role: DebateRole,
  topic: DebateTopic,
  priorTexts: readonly string[] = [],
): string {
  const [forText = '', againstText = ''] = priorTexts;
  switch (role) {
    case 'FOR':
      return buildForPrompt(topic);
    case 'AGAINST':
      return buildAgainstPrompt(topic, forText);
    case 'SYNTHESIS':
      return buildSynthesisPrompt(topic, forText, againstText);
  }
}
