import { describe, expect, it } from 'vitest'
import { ClientConfig } from '../client/config.js'
import { ErrorClassifier, isSuccessStatus, statusPatterns } from '../http/classifier.js'
import { ResolutionError, TimeoutError, TransportError } from '../http/errors.js'

function classifierFor(patterns: Array<string | number>, options: { retryOnConnectionError?: boolean } = {}): ErrorClassifier {
  return new ErrorClassifier(ClientConfig.from({ retryStatusPatterns: patterns, ...options }))
}

describe('statusPatterns', () => {
  it('lists the exact code and both families', () => {
    expect(statusPatterns(503)).toEqual(['503', '50x', '5xx'])
    expect(statusPatterns(404)).toEqual(['404', '40x', '4xx'])
  })
})

describe('isSuccessStatus', () => {
  it('accepts only 2xx', () => {
    expect(isSuccessStatus(200)).toBe(true)
    expect(isSuccessStatus(299)).toBe(true)
    expect(isSuccessStatus(199)).toBe(false)
    expect(isSuccessStatus(304)).toBe(false)
  })
})

describe('errorClassifier', () => {
  describe('status matching', () => {
    it('matches a one-digit family', () => {
      const classifier = classifierFor(['5xx'])
      expect(classifier.isRetriableStatus(500)).toBe(true)
      expect(classifier.isRetriableStatus(503)).toBe(true)
      expect(classifier.isRetriableStatus(599)).toBe(true)
      expect(classifier.isRetriableStatus(404)).toBe(false)
    })

    it('matches a two-digit family', () => {
      const classifier = classifierFor(['40x'])
      expect(classifier.isRetriableStatus(404)).toBe(true)
      expect(classifier.isRetriableStatus(409)).toBe(true)
      expect(classifier.isRetriableStatus(410)).toBe(false)
    })

    it('matches exact codes given as numbers or strings', () => {
      const classifier = classifierFor([429, '502'])
      expect(classifier.isRetriableStatus(429)).toBe(true)
      expect(classifier.isRetriableStatus(502)).toBe(true)
      expect(classifier.isRetriableStatus(503)).toBe(false)
      expect(classifier.isRetriableStatus(428)).toBe(false)
    })

    it('retries nothing with an empty pattern set', () => {
      const classifier = classifierFor([])
      expect(classifier.isRetriableStatus(500)).toBe(false)
    })
  })

  describe('classifyResponse', () => {
    it('signals a retriable response', () => {
      const response = { status: 502 }
      expect(classifierFor(['5xx']).classifyResponse(response)).toEqual({
        ok: false,
        signal: { kind: 'response', response },
      })
    })

    it('passes other responses through, 2xx or not', () => {
      const classifier = classifierFor(['5xx'])
      expect(classifier.classifyResponse({ status: 200 })).toEqual({ ok: true, value: { status: 200 } })
      expect(classifier.classifyResponse({ status: 404 })).toEqual({ ok: true, value: { status: 404 } })
    })
  })

  describe('classifyError', () => {
    it('retries connection errors, timeouts included, by default', () => {
      const classifier = classifierFor(['5xx'])
      const refused = new TransportError('refused')
      const slow = new TimeoutError('slow')

      expect(classifier.classifyError(refused)).toEqual({ ok: false, signal: { kind: 'error', error: refused } })
      expect(classifier.classifyError(slow)).toEqual({ ok: false, signal: { kind: 'error', error: slow } })
    })

    it('rethrows connection errors when retryOnConnectionError is off', () => {
      const classifier = classifierFor(['5xx'], { retryOnConnectionError: false })
      const refused = new TransportError('refused')

      expect(() => classifier.classifyError(refused)).toThrow(refused)
    })

    it('retries configured error kinds', () => {
      const classifier = new ErrorClassifier(ClientConfig.from({ retryableErrorKinds: [ResolutionError] }))
      const error = new ResolutionError('naming service down')

      expect(classifier.isRetriableError(error)).toBe(true)
      expect(classifier.classifyError(error)).toEqual({ ok: false, signal: { kind: 'error', error } })
    })

    it('rethrows everything else unchanged', () => {
      const classifier = classifierFor(['5xx'])
      const error = new RangeError('bug')

      expect(() => classifier.classifyError(error)).toThrow(error)
    })

    it('rethrows non-Error values as they are', () => {
      let thrown: unknown
      try {
        classifierFor(['5xx']).classifyError('not an error')
      }
      catch (error) {
        thrown = error
      }
      expect(thrown).toBe('not an error')
    })
  })
})
