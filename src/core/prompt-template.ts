import type { ChatMessage, ContentPart, HistoryEntry, Passage, Turn } from './types.js'

export interface PromptTemplateConfig {
  systemPrompt: string
  contextTemplate: string
}

/** Numbers passages as `[n] text (source)` lines. */
export function formatPassages(passages: readonly Passage[]): string {
  return passages
    .map((passage, index) => {
      const source = passage.source ? ` (${passage.source})` : ''
      return `[${index + 1}] ${passage.text.trim()}${source}`
    })
    .join('\n')
}

/**
 * Appends retrieved passages to the system prompt through the context
 * template. Leaves the prompt untouched when nothing was retrieved.
 */
export function applyContextTemplate(
  config: PromptTemplateConfig,
  passages: readonly Passage[]
): string {
  if (passages.length === 0) return config.systemPrompt

  const context = config.contextTemplate.replaceAll('{{context}}', formatPassages(passages))
  return config.systemPrompt ? `${config.systemPrompt}\n\n${context}` : context
}

export function turnText(parts: readonly ContentPart[]): string {
  return parts
    .map((part) => (part.kind === 'text' ? part.value.trim() : ''))
    .filter(Boolean)
    .join('\n')
}

/**
 * Assembles the message list for one turn. Earlier turns are replayed as
 * text only; images are sent with the turn that carried them.
 */
export function buildMessages(
  config: PromptTemplateConfig,
  history: readonly HistoryEntry[],
  turn: Turn,
  passages: readonly Passage[]
): ChatMessage[] {
  const messages: ChatMessage[] = []
  const system = applyContextTemplate(config, passages)
  if (system) messages.push({ role: 'system', parts: [{ kind: 'text', value: system }] })

  for (const entry of history) {
    const text = turnText(entry.turn.parts)
    if (text) messages.push({ role: 'user', parts: [{ kind: 'text', value: text }] })
    messages.push({ role: 'assistant', parts: [{ kind: 'text', value: entry.response }] })
  }

  messages.push({ role: 'user', parts: turn.parts })
  return messages
}
