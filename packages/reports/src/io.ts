import fs from 'node:fs'
import path from 'node:path'

export function atomicWrite(file: string, data: string | Buffer) {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  const tmp = `${file}.tmp-${process.pid}-${Date.now()}`
  fs.writeFileSync(tmp, data)
  fs.renameSync(tmp, file)
}

export function isErrno(e: unknown, code: string): boolean {
  return e instanceof Error && 'code' in e && e.code === code
}

/** Create `file` only if it does not exist yet. `false` means someone else holds the name. */
export function createExclusive(file: string, data: string): boolean {
  fs.mkdirSync(path.dirname(file), { recursive: true })
  try {
    fs.writeFileSync(file, data, { flag: 'wx' })
    return true
  } catch (e) {
    if (isErrno(e, 'EEXIST')) return false
    throw e
  }
}

export const toJson = (data: unknown) => JSON.stringify(data, null, 2) + '\n'
