import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { ConfigError } from '@archgate/core'
import { DEFAULT_OPENAI_MODEL, createOpenAIProvider, type ChatCompletionsClient } from '../index'

type Body = Parameters<ChatCompletionsClient['chat']['completions']['create']>[0]

function fakeClient(content: string | null) {
  const bodies: Body[] = []
  const signals: Array<AbortSignal | undefined> = []
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        async create(body, options) {
          bodies.push(body)
          signals.push(options?.signal)
          return { choices: [{ message: { content } }] }
        },
      },
    },
  }
  return { client, bodies, signals }
}

const saved = { key: process.env.OPENAI_API_KEY, model: process.env.ARCHGATE_OPENAI_MODEL }

beforeEach(() => {
  delete process.env.OPENAI_API_KEY
  delete process.env.ARCHGATE_OPENAI_MODEL
})

afterEach(() => {
  if (saved.key === undefined) delete process.env.OPENAI_API_KEY
  else process.env.OPENAI_API_KEY = saved.key
  if (saved.model === undefined) delete process.env.ARCHGATE_OPENAI_MODEL
  else process.env.ARCHGATE_OPENAI_MODEL = saved.model
})

describe('@archgate/provider-openai', () => {
  it('requires an API key when no client is given', () => {
    expect(() => createOpenAIProvider()).toThrow(ConfigError)
  })

  it('builds the SDK client from an explicit key', () => {
    const p = createOpenAIProvider({ apiKey: 'test-secret' })
    expect(p.name).toBe('openai')
    expect(p.model).toBe(DEFAULT_OPENAI_MODEL)
  })

  it('sends system and user messages in JSON mode and returns the raw content', async () => {
    const { client, bodies, signals } = fakeClient('{"approved":true}')
    const p = createOpenAIProvider({ client, options: { model: 'gpt-test', maxTokens: 500 } })
    const controller = new AbortController()

    const out = await p.review({ system: 'SYS', user: 'USR', signal: controller.signal })

    expect(out).toBe('{"approved":true}')
    expect(bodies).toEqual([{
      model: 'gpt-test',
      temperature: 0,
      max_tokens: 500,
      messages: [
        { role: 'system', content: 'SYS' },
        { role: 'user', content: 'USR' },
      ],
      response_format: { type: 'json_object' },
    }])
    expect(signals[0]).toBe(controller.signal)
  })

  it('takes the model from the environment', () => {
    process.env.ARCHGATE_OPENAI_MODEL = 'gpt-env'
    expect(createOpenAIProvider({ client: fakeClient('').client }).model).toBe('gpt-env')
  })

  it('returns an empty string for an empty completion', async () => {
    const p = createOpenAIProvider({ client: fakeClient(null).client })
    await expect(p.review({ system: '', user: '', signal: new AbortController().signal })).resolves.toBe('')
  })

  it('dumps prompts and responses per call in debug mode', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'archgate-openai-'))
    const p = createOpenAIProvider({ client: fakeClient('{}').client, debug: { enabled: true, dir } })
    const signal = new AbortController().signal

    await p.review({ system: 'S1', user: 'U1', signal })
    await p.review({ system: 'S2', user: 'U2', signal })

    expect(fs.readdirSync(dir).sort()).toEqual([
      '01.response.txt', '01.system.txt', '01.user.txt',
      '02.response.txt', '02.system.txt', '02.user.txt',
    ])
    expect(fs.readFileSync(path.join(dir, '02.user.txt'), 'utf8')).toBe('U2')
  })
})
