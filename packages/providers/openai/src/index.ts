import OpenAI from 'openai'

import { ConfigError, type ReviewRequest } from '@archgate/core'
import { debugDump, type ProviderInit, type ReviewProvider } from '@archgate/provider-types'

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini'

type CompletionBody = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming

/** The slice of the SDK client this provider calls; tests pass an in-process fake. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: CompletionBody,
        options?: { signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>
    }
  }
}

export interface OpenAIProviderInit extends ProviderInit {
  apiKey?: string
  client?: ChatCompletionsClient
}

/* ──────────────────────────────────────────────────────────────
 * Provider
 * ──────────────────────────────────────────────────────────── */
export function createOpenAIProvider(init: OpenAIProviderInit = {}): ReviewProvider {
  const opts = init.options ?? {}
  const model = opts.model || process.env.ARCHGATE_OPENAI_MODEL || DEFAULT_OPENAI_MODEL

  let client = init.client
  if (!client) {
    const apiKey = init.apiKey || process.env.OPENAI_API_KEY
    if (!apiKey) {
      throw new ConfigError('OPENAI_API_KEY is required for the openai provider (env var not set)')
    }
    client = new OpenAI({ apiKey })
  }
  const chat = client.chat.completions

  let calls = 0

  return {
    name: 'openai',
    model,
    async review(req: ReviewRequest): Promise<string> {
      const call = String(++calls).padStart(2, '0')
      debugDump(init.debug, `${call}.system.txt`, req.system, init.logger)
      debugDump(init.debug, `${call}.user.txt`, req.user, init.logger)

      const body: CompletionBody = {
        model,
        temperature: opts.temperature ?? 0,
        messages: [
          { role: 'system', content: req.system },
          { role: 'user', content: req.user },
        ],
        response_format: { type: 'json_object' },
      }
      if (typeof opts.maxTokens === 'number') body.max_tokens = opts.maxTokens

      const resp = await chat.create(body, { signal: req.signal })
      const content = resp.choices[0]?.message.content ?? ''

      debugDump(init.debug, `${call}.response.txt`, content, init.logger)
      init.logger?.debug(`[openai] ${model} answered with ${content.length} chars`)
      return content
    },
  }
}

export default createOpenAIProvider
