import type { Dependency } from '../../types.js'
import { ScanError } from '../../errors.js'

// Parses requirements.txt-style manifests: one declaration per line,
// `name==version` or a bare name. Anything else is kept as a bare name.
export function parseManifest(text: string): Dependency[] {
  const out: Dependency[] = []
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim()
    if (!line || line.startsWith('#')) continue
    const sep = line.indexOf('==')
    if (sep === -1) {
      out.push({ name: line })
      continue
    }
    const name = line.slice(0, sep).trim()
    const version = line.slice(sep + 2).trim()
    out.push(version ? { name, version } : { name })
  }
  return out
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false })

export function decodeManifest(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes)
  } catch (err) {
    throw new ScanError('Manifest is not valid UTF-8 text.', { cause: err })
  }
}
