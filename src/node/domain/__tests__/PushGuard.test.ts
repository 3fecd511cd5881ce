import { describe, expect, it } from 'vitest'
import { ZERO_OID } from '../../shared/constants'
import { NegotiationRejectedError } from '../../shared/errors'
import type { RefUpdate } from '../PushGuard'
import { PushGuard } from '../PushGuard'

const REFNAME = 'refs/heads/main'

function update(src: string, dst = 'f00d'): RefUpdate {
  return { src, dst, refname: REFNAME }
}

describe('PushGuard.check', () => {
  it('accepts any update when no expectation is set', () => {
    expect(() => PushGuard.check(null, [update('aaaa')])).not.toThrow()
    expect(() => PushGuard.check(undefined, [])).not.toThrow()
  })

  it('accepts when an update starts from the expected tip', () => {
    expect(() => PushGuard.check('aaaa', [update('bbbb'), update('aaaa')])).not.toThrow()
  })

  it('accepts creating a ref the remote does not have', () => {
    expect(() => PushGuard.check('aaaa', [update(ZERO_OID)])).not.toThrow()
  })

  it('rejects when the remote moved', () => {
    expect(() => PushGuard.check('aaaa', [update('bbbb')])).toThrow(NegotiationRejectedError)
  })

  it('rejects an empty update list when an expectation is set', () => {
    expect(() => PushGuard.check('aaaa', [])).toThrow(
      'Remote (no refs) is at (nothing advertised), expected aaaa'
    )
  })

  it('reports what the remote advertised', () => {
    try {
      PushGuard.check('aaaa', [update('bbbb')])
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(NegotiationRejectedError)
      expect(error).toMatchObject({ expected: 'aaaa', advertised: ['bbbb'], refnames: [REFNAME] })
    }
  })
})
