import type { ReviewDelegate, ReviewRequest, Unit } from '../../types'

export function fileDiff(file: string, added: string[]): string {
  return [
    `diff --git a/${file} b/${file}`,
    `--- a/${file}`,
    `+++ b/${file}`,
    `@@ -1,0 +1,${added.length} @@`,
    ...added.map((l) => `+${l}`),
    '',
  ].join('\n')
}

export function unit(id: string, tokens: number): Unit {
  return { id, origin: 'diff', text: '', tokens }
}

export function reviewJson(issues: string[] = [], suggestions: string[] = [], summary = 'reviewed'): string {
  return JSON.stringify({ approved: issues.length === 0, issues, suggestions, summary })
}

export type FakeDelegate = ReviewDelegate & { calls: ReviewRequest[] }

/** In-process reviewer that answers from a script. */
export function scriptedDelegate(reply: (req: ReviewRequest) => string | Promise<string>, name = 'fake'): FakeDelegate {
  const calls: ReviewRequest[] = []
  return {
    name,
    calls,
    async review(req) {
      calls.push(req)
      return reply(req)
    },
  }
}

/** Never answers; rejects once the caller aborts. */
export function hangUntilAborted(req: ReviewRequest): Promise<string> {
  return new Promise((_, reject) => {
    req.signal.addEventListener('abort', () => reject(new Error('aborted')))
  })
}

export function chunkNumber(req: ReviewRequest): number {
  const m = req.user.match(/CHUNK (\d+) of/)
  return m ? Number(m[1]) : 0
}

/** Small deterministic PRNG for property-style tests. */
export function lcg(seed: number): () => number {
  let s = seed >>> 0
  return () => {
    s = (s * 1664525 + 1013904223) >>> 0
    return s / 0x100000000
  }
}
