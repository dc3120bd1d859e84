import { describe, it, expect } from 'vitest'
import {
  AmbiguousObjectError,
  CorruptObjectError,
  hasErrorCode,
  isTreestoreError,
  LockError,
  ObjectNotFoundError,
  SubprocessError,
  systemErrorCode,
  TreestoreError,
  TypeMismatchError,
} from '../src/errors'

describe('errors', () => {
  it('share the base class and carry codes', () => {
    const errors = [
      new ObjectNotFoundError('abcde'),
      new AmbiguousObjectError('abcde', ['abcde1', 'abcde2']),
      new CorruptObjectError('bad', 'BAD_PACK'),
      new TypeMismatchError('abcde', 'tree', 'blob'),
      new LockError('held', 'LOCK_TIMEOUT', '/x.lock'),
    ]
    expect(errors.every(error => isTreestoreError(error))).toBe(true)
    expect(errors.map(error => error.code)).toEqual(['NOT_FOUND', 'AMBIGUOUS', 'BAD_PACK', 'TYPE_MISMATCH', 'LOCK_TIMEOUT'])
    expect(errors.map(error => error.name)).toEqual([
      'ObjectNotFoundError',
      'AmbiguousObjectError',
      'CorruptObjectError',
      'TypeMismatchError',
      'LockError',
    ])
  })

  it('keep ambiguity distinct from not-found', () => {
    const error = new AmbiguousObjectError('abcde', ['abcde1', 'abcde2'])
    expect(error).not.toBeInstanceOf(ObjectNotFoundError)
    expect(error.message).toBe('Object id not unique: abcde matches 2 objects')
  })

  it('serialize context with toJSON', () => {
    const cause = new Error('inner')
    const json = new CorruptObjectError('bad frame', 'NOT_A_LOOSE_OBJECT', { id: 'abc', path: '/o/ab/c', cause }).toJSON()
    expect(json).toMatchObject({
      name: 'CorruptObjectError',
      message: 'bad frame',
      code: 'NOT_A_LOOSE_OBJECT',
      cause: 'inner',
      id: 'abc',
      path: '/o/ab/c',
    })
  })

  it('wrap unknown values', () => {
    const wrapped = TreestoreError.wrap('plain string')
    expect(wrapped.code).toBe('INTERNAL')
    expect(wrapped.message).toBe('plain string')
    expect(wrapped.cause).toBe('plain string')
  })

  it('describe subprocess failures', () => {
    expect(new SubprocessError('git log', 128, 'fatal: nope\n').message).toBe('git log: fatal: nope')
    expect(new SubprocessError('git log', 2, '').message).toBe('git log: exited with status 2')
  })

  it('match codes with hasErrorCode', () => {
    const error: unknown = new LockError('held', 'LOCK_TIMEOUT', '/x.lock')
    expect(hasErrorCode(error, 'LOCK_TIMEOUT')).toBe(true)
    expect(hasErrorCode(error, 'LOCK_IO')).toBe(false)
    expect(hasErrorCode(new Error('plain'), 'LOCK_TIMEOUT')).toBe(false)
  })

  it('read system error codes', () => {
    expect(systemErrorCode(Object.assign(new Error('x'), { code: 'ENOENT' }))).toBe('ENOENT')
    expect(systemErrorCode(Object.assign(new Error('x'), { code: 5 }))).toBeUndefined()
    expect(systemErrorCode('ENOENT')).toBeUndefined()
    expect(systemErrorCode(null)).toBeUndefined()
  })
})
