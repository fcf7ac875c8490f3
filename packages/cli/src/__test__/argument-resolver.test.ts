import { describe, test, expect } from 'vitest'
import { TreeError } from '@treecli/core'
import { resolveArguments } from '../argument-resolver.js'
import {
  ErrInvalidOption,
  ErrMissingArgument,
  ErrMissingValue,
  ErrUnexpectedArgument,
  ErrUnknownArgument,
} from '../errors.js'
import { normalizeParams, type ParamDecl } from '../params.js'

const params = (...decls: ParamDecl[]) => normalizeParams('test', decls)

function failure(fn: () => unknown): TreeError {
  try {
    fn()
  } catch (err) {
    if (err instanceof TreeError) return err
    throw err
  }
  throw new Error('expected a TreeError')
}

describe('resolveArguments', () => {
  test('binds positionals in declaration order', () => {
    expect(resolveArguments(params('a', 'b'), ['1', '2'])).toEqual({ a: '1', b: '2' })
  })

  test('keyword forms fill their parameter and positionals take the next free one', () => {
    expect(resolveArguments(params('a', 'b', 'c'), ['x', '--b=y', 'z'])).toEqual({ a: 'x', b: 'y', c: 'z' })
    expect(resolveArguments(params('a', 'b', 'c'), ['--a', 'x', 'y', 'z'])).toEqual({ a: 'x', b: 'y', c: 'z' })
  })

  test('a later binding wins', () => {
    expect(resolveArguments(params('a'), ['1', '--a=2'])).toEqual({ a: '2' })
    expect(resolveArguments(params('a'), ['--a=1', '--a', '2'])).toEqual({ a: '2' })
  })

  test('--name=value splits at the first "="', () => {
    expect(resolveArguments(params('q'), ['--q=k=v'])).toEqual({ q: 'k=v' })
    expect(resolveArguments(params('q'), ['--q='])).toEqual({ q: '' })
  })

  test('--name takes the next token verbatim, even one that looks like an option', () => {
    expect(resolveArguments(params('a', 'b'), ['--a', '--b', 'x'])).toEqual({ a: '--b', b: 'x' })
  })

  test('single-dash tokens are positional', () => {
    expect(resolveArguments(params('n'), ['-5'])).toEqual({ n: '-5' })
  })

  test('applies defaults and leaves unbound optionals out', () => {
    const ps = params('name', { name: 'greeting', default: 'hello' }, { name: 'suffix', optional: true })
    expect(resolveArguments(ps, ['bob'])).toEqual({ name: 'bob', greeting: 'hello' })
    expect(Object.keys(resolveArguments(ps, ['bob', 'hi', '!']))).toEqual(['name', 'greeting', 'suffix'])
  })

  test('the result is frozen', () => {
    expect(Object.isFrozen(resolveArguments(params('a'), ['1']))).toBe(true)
  })

  test('a parameter named __proto__ is ordinary data', () => {
    const args = resolveArguments(params('__proto__'), ['x'])
    expect(Object.keys(args)).toEqual(['__proto__'])
    expect(args['__proto__']).toBe('x')
  })

  test('missing required argument', () => {
    const err = failure(() => resolveArguments(params('a', 'b'), ['1']))
    expect(ErrMissingArgument.is(err)).toBe(true)
    expect(err.message).toBe('Missing required argument: b')
  })

  test('unknown keyword argument', () => {
    const err = failure(() => resolveArguments(params('a'), ['--nope=1']))
    expect(ErrUnknownArgument.is(err)).toBe(true)
    expect(err.message).toBe('Unknown argument: --nope')
  })

  test('trailing --name without a value', () => {
    const err = failure(() => resolveArguments(params('a'), ['--a']))
    expect(ErrMissingValue.is(err)).toBe(true)
    expect(err.message).toBe('Option --a expects a value')
  })

  test('more positionals than parameters', () => {
    const err = failure(() => resolveArguments(params('a'), ['1', '2']))
    expect(ErrUnexpectedArgument.is(err)).toBe(true)
    expect(err.message).toBe('Unexpected argument: 2')
  })

  test('a positional is not accepted once every parameter is bound by keyword', () => {
    const err = failure(() => resolveArguments(params('a'), ['--a=1', '2']))
    expect(ErrUnexpectedArgument.is(err)).toBe(true)
  })

  test('option tokens without a name', () => {
    expect(ErrInvalidOption.is(failure(() => resolveArguments(params('a'), ['--'])))).toBe(true)
    expect(ErrInvalidOption.is(failure(() => resolveArguments(params('a'), ['--=x'])))).toBe(true)
  })
})
