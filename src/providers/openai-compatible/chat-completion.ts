/**
 * Chat Completions translation shared by every OpenAI-compatible backend.
 */

import type OpenAI from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import { normalizeRole, type Message } from '../../core/types.js'

/** One chat message per turn, same role; unknown roles go out as `user`. */
export function toChatMessages(messages: readonly Message[]): ChatCompletionMessageParam[] {
  return messages.map((m): ChatCompletionMessageParam => {
    switch (normalizeRole(m.role)) {
      case 'system':
        return { role: 'system', content: m.content }
      case 'assistant':
        return { role: 'assistant', content: m.content }
      default:
        return { role: 'user', content: m.content }
    }
  })
}

/**
 * Issue one completion request and return the first choice's text.
 * No choices (or a null content) is an empty reply, not an error.
 */
export async function sendChatCompletion(
  client: OpenAI,
  model: string,
  messages: readonly Message[],
  signal?: AbortSignal,
): Promise<string> {
  const completion = await client.chat.completions.create(
    { model, messages: toChatMessages(messages) },
    { signal },
  )
  const choice = completion.choices[0]
  if (!choice) return ''
  return choice.message.content ?? ''
}
