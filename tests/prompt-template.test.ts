import { describe, expect, it } from 'vitest'

import { applyContextTemplate, buildMessages, formatPassages, turnText } from '../src/core/prompt-template.js'
import type { Turn } from '../src/core/types.js'

const config = {
  systemPrompt: 'You are helpful.',
  contextTemplate: 'Passages:\n{{context}}\nEnd of passages.'
}

function turn(value: string): Turn {
  return { id: 't1', parts: [{ kind: 'text', value }], createdAt: new Date(0), endpoint: 'chat' }
}

describe('applyContextTemplate', () => {
  it('keeps the system prompt unchanged without passages', () => {
    expect(applyContextTemplate(config, [])).toBe('You are helpful.')
  })

  it('appends numbered passages through the template', () => {
    const result = applyContextTemplate(config, [
      { text: ' Paris is the capital of France. ', score: 0.9, source: 'geo.md' },
      { text: 'The Seine runs through Paris.', score: 0.7 }
    ])

    expect(result).toBe(
      'You are helpful.\n\nPassages:\n[1] Paris is the capital of France. (geo.md)\n[2] The Seine runs through Paris.\nEnd of passages.'
    )
  })

  it('uses the context alone when the system prompt is empty', () => {
    const result = applyContextTemplate({ systemPrompt: '', contextTemplate: '{{context}}' }, [
      { text: 'only', score: 1 }
    ])
    expect(result).toBe('[1] only')
  })
})

describe('formatPassages', () => {
  it('returns an empty string for no passages', () => {
    expect(formatPassages([])).toBe('')
  })
})

describe('turnText', () => {
  it('joins trimmed text parts and skips images', () => {
    expect(
      turnText([
        { kind: 'text', value: ' first ' },
        { kind: 'image', mime: 'image/png', data: new Uint8Array([1]) },
        { kind: 'text', value: '' },
        { kind: 'text', value: 'second' }
      ])
    ).toBe('first\nsecond')
  })
})

describe('buildMessages', () => {
  it('omits the system message when there is no prompt and no context', () => {
    const messages = buildMessages({ systemPrompt: '', contextTemplate: '{{context}}' }, [], turn('hi'), [])
    expect(messages).toEqual([{ role: 'user', parts: [{ kind: 'text', value: 'hi' }] }])
  })

  it('keeps the assistant reply for an image-only earlier turn', () => {
    const earlier: Turn = {
      id: 't0',
      parts: [{ kind: 'image', mime: 'image/png', data: new Uint8Array([1]) }],
      createdAt: new Date(0),
      endpoint: 'chat'
    }
    const messages = buildMessages(config, [{ turn: earlier, response: 'A chart.' }], turn('Explain it'), [])

    expect(messages.map((message) => message.role)).toEqual(['system', 'assistant', 'user'])
  })
})
