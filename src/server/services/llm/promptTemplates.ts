/**
 * Chat templates for local models that take a single raw prompt
 */

import type { LLMMessage } from './LLMProvider.js';

export type ModelFamily = 'llama' | 'gemma' | 'plain';

export function modelFamily(modelName: string): ModelFamily {
  const name = modelName.toLowerCase();
  if (name.includes('llama')) return 'llama';
  if (name.includes('gemma')) return 'gemma';
  return 'plain';
}

function joinContent(messages: LLMMessage[], role: LLMMessage['role']): string {
  return messages
    .filter((msg) => msg.role === role)
    .map((msg) => msg.content)
    .join('\n\n');
}

/**
 * Render messages in the prompt format of the model's family
 *
 * @example
 * ```typescript
 * formatPrompt('gemma2:27b', [{ role: 'user', content: 'Hi' }])
 * // '<start_of_turn>userHi<end_of_turn><start_of_turn>model'
 * ```
 */
export function formatPrompt(modelName: string, messages: LLMMessage[]): string {
  const system = joinContent(messages, 'system');
  const user = joinContent(messages, 'user');

  switch (modelFamily(modelName)) {
    case 'llama':
      return (
        `<|begin_of_text|><|start_header_id|>system<|end_header_id|>${system}<|eot_id|>` +
        `<|start_header_id|>user<|end_header_id|>${user}<|eot_id|> <|start_header_id|>assistant<|end_header_id|>`
      );
    case 'gemma':
      // Gemma has no system turn
      return `<start_of_turn>user${user}<end_of_turn><start_of_turn>model`;
    default:
      return [system, user].filter((part) => part.length > 0).join('\n');
  }
}
