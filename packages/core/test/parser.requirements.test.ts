import { describe, it, expect } from 'vitest'
import { decodeManifest, parseManifest } from '../src/parsers/pip/requirements.js'
import { ScanError } from '../src/errors.js'

describe('parseManifest', () => {
  it('skips blank lines and comments', () => {
    const deps = parseManifest('\n   \n# pinned for prod\n  # indented comment\nflask==1.0\n')
    expect(deps).toEqual([{ name: 'flask', version: '1.0' }])
  })

  it('strips whitespace around name and version', () => {
    expect(parseManifest('  Django == 3.2.1  ')).toEqual([{ name: 'Django', version: '3.2.1' }])
  })

  it('splits on the first separator only', () => {
    expect(parseManifest('pkg==1.0==2')).toEqual([{ name: 'pkg', version: '1.0==2' }])
  })

  it('treats lines without a pin as bare names', () => {
    expect(parseManifest('requests\npkg=1.0\nurllib3>=1.26')).toEqual([
      { name: 'requests' },
      { name: 'pkg=1.0' },
      { name: 'urllib3>=1.26' }
    ])
  })

  it('treats an empty pin as no version', () => {
    expect(parseManifest('pkg==   ')).toEqual([{ name: 'pkg' }])
  })

  it('keeps duplicates in declaration order and handles CRLF', () => {
    expect(parseManifest('a==1\r\nb\r\na==1\r\n')).toEqual([
      { name: 'a', version: '1' },
      { name: 'b' },
      { name: 'a', version: '1' }
    ])
  })

  it('returns nothing for an empty manifest', () => {
    expect(parseManifest('')).toEqual([])
  })
})

describe('decodeManifest', () => {
  it('decodes UTF-8 and drops a byte order mark', () => {
    const bytes = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('flask==1.0\n', 'utf8')])
    expect(decodeManifest(bytes)).toBe('flask==1.0\n')
  })

  it('rejects invalid UTF-8 with a ScanError', () => {
    const bytes = Buffer.from([0x66, 0x6c, 0xff, 0x0a])
    expect(() => decodeManifest(bytes)).toThrow(ScanError)
    expect(() => decodeManifest(bytes)).toThrow('Manifest is not valid UTF-8 text.')
  })
})
