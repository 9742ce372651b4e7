/**
 * Segment 09: Error System Tests
 *
 * CarePlannerError base class, error code enum, and all error subclasses.
 */

import { describe, it, expect } from 'vitest'
import {
  CarePlannerError,
  CarePlannerErrorCode,
  ValidationError,
  ConfigError,
  NotFoundError,
  InvalidTaskError,
  ParseError,
} from '../src/errors'

describe('Segment 09: Error System', () => {
  describe('CarePlannerError base class', () => {
    it('constructor sets code and message', () => {
      const err = new CarePlannerError(CarePlannerErrorCode.NOT_FOUND, 'test message')
      expect(err.code).toBe('NOT_FOUND')
      expect(err.message).toBe('test message')
      expect(err.name).toBe('CarePlannerError')
    })

    it('is an Error', () => {
      expect(new CarePlannerError(CarePlannerErrorCode.VALIDATION, 'x')).toBeInstanceOf(Error)
    })
  })

  describe('subclasses', () => {
    const cases = [
      { make: () => new ValidationError('m'), type: ValidationError, name: 'ValidationError', code: 'VALIDATION' },
      { make: () => new ConfigError('m'), type: ConfigError, name: 'ConfigError', code: 'INVALID_CONFIG' },
      { make: () => new NotFoundError('m'), type: NotFoundError, name: 'NotFoundError', code: 'NOT_FOUND' },
      { make: () => new InvalidTaskError('m'), type: InvalidTaskError, name: 'InvalidTaskError', code: 'INVALID_TASK' },
      { make: () => new ParseError('m'), type: ParseError, name: 'ParseError', code: 'PARSE_ERROR' },
    ]

    for (const c of cases) {
      it(`${c.name} carries its name and code`, () => {
        const err = c.make()
        expect(err).toBeInstanceOf(c.type)
        expect(err).toBeInstanceOf(CarePlannerError)
        expect(err.name).toBe(c.name)
        expect(err.code).toBe(c.code)
        expect(err.message).toBe('m')
      })
    }

    it('ValidationError keeps its issue list', () => {
      expect(new ValidationError('bad', ['a: x', 'b: y']).issues).toEqual(['a: x', 'b: y'])
      expect(new ValidationError('bad').issues).toEqual([])
    })
  })
})
