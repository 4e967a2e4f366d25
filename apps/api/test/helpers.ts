import { pino } from 'pino'
import { dependencyKey, type LookupClient, type LookupResult, type Vulnerability } from '@depwatch/core'

export const silentLog = pino({ level: 'silent' })

export const vuln = (id: string): Vulnerability => ({ id, summary: 'N/A', details: 'N/A' })

// Answers from a table keyed by `name==version`; anything else is clean
export class TableLookup implements LookupClient {
  calls: string[] = []

  constructor(private readonly table: Record<string, LookupResult> = {}) {}

  async lookup(name: string, version: string): Promise<LookupResult> {
    const key = dependencyKey(name, version)
    this.calls.push(key)
    return this.table[key] ?? { kind: 'found', vulnerabilities: [] }
  }
}

export function multipart(fields: Record<string, string>, file?: { field?: string; filename?: string; type: string; content: string | Buffer }) {
  const boundary = '----depwatch-test-boundary'
  const chunks: Buffer[] = []
  for (const [name, value] of Object.entries(fields)) {
    chunks.push(Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${name}"\r\n\r\n${value}\r\n`))
  }
  if (file) {
    const field = file.field ?? 'requirements_file'
    const filename = file.filename ?? 'requirements.txt'
    chunks.push(Buffer.from(`--${boundary}\r\nContent-Disposition: form-data; name="${field}"; filename="${filename}"\r\nContent-Type: ${file.type}\r\n\r\n`))
    chunks.push(typeof file.content === 'string' ? Buffer.from(file.content, 'utf8') : file.content)
    chunks.push(Buffer.from('\r\n'))
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`))
  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` }
  }
}
