import { createMockProvider } from '@archgate/provider-mock'
import { createOpenAIProvider } from '@archgate/provider-openai'
import type { ProviderFactory, ProviderInit, ReviewProvider } from '@archgate/provider-types'
import type { ProviderName } from '../config/config'

const REGISTRY: Record<Exclude<ProviderName, 'none'>, ProviderFactory> = {
  openai: (init) => createOpenAIProvider(init),
  mock: createMockProvider,
}

/** `none` means no remote reviewer: the audit runs on pattern matching alone. */
export function pickProvider(name: ProviderName, init: ProviderInit = {}): ReviewProvider | undefined {
  if (name === 'none') return undefined
  return REGISTRY[name](init)
}
