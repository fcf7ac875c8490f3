import { describe, test, expect } from 'vitest'
import { TreeError, createDebugLogger } from '@treecli/core'
import { CommandTree } from '../command-tree.js'
import { Dispatcher } from '../dispatcher.js'
import { ErrMissingArgument, ErrUnknownCommand } from '../errors.js'
import { RegistrationStore } from '../registration-store.js'

function setup(lines: string[] = []) {
  const calls: { path: string; args: unknown }[] = []
  const store = new RegistrationStore()
  const record = (path: string) => (args: unknown) => {
    calls.push({ path, args })
    return `ran ${path}`
  }

  store.register('/greet', { params: ['name', { name: 'greeting', default: 'hello' }] }, record('greet'))
  store.register('/g/cmd', { params: ['x'] }, record('g/cmd'))
  store.register('/cmd', { params: ['x'] }, record('cmd'))
  store.register('/config/set', { params: ['key', 'value'] }, record('config/set'))
  store.register('/search', { params: ['help'] }, record('search'))
  store.register('/fail', {}, () => {
    throw new Error('handler exploded')
  })
  store.register('/later', {}, async () => 42)

  const logger = createDebugLogger({ scope: 'tool', enabled: true, sink: (l) => lines.push(l) })
  const dispatcher = new Dispatcher(CommandTree.build(store.records()), { programName: 'tool', logger })
  return { dispatcher, calls }
}

async function rejection(p: Promise<unknown>): Promise<unknown> {
  try {
    await p
  } catch (err) {
    return err
  }
  throw new Error('expected a rejection')
}

describe('Dispatcher', () => {
  test('invokes the handler with resolved arguments', async () => {
    const { dispatcher, calls } = setup()
    const outcome = await dispatcher.dispatch(['greet', 'alice'])

    expect(outcome.kind).toBe('invoked')
    if (outcome.kind === 'invoked') {
      expect(outcome.result).toBe('ran greet')
      expect(outcome.args).toEqual({ name: 'alice', greeting: 'hello' })
    }
    expect(calls).toEqual([{ path: 'greet', args: { name: 'alice', greeting: 'hello' } }])
  })

  test('routes by longest prefix', async () => {
    const { dispatcher, calls } = setup()
    await dispatcher.dispatch(['g', 'cmd', '1'])
    await dispatcher.dispatch(['cmd', '2'])
    expect(calls).toEqual([
      { path: 'g/cmd', args: { x: '1' } },
      { path: 'cmd', args: { x: '2' } },
    ])
  })

  test('awaits async handlers', async () => {
    const { dispatcher } = setup()
    const outcome = await dispatcher.dispatch(['later'])
    expect(outcome.kind === 'invoked' && outcome.result).toBe(42)
  })

  test('--completion alone yields the script and invokes nothing', async () => {
    const { dispatcher, calls } = setup()
    const outcome = await dispatcher.dispatch(['--completion'])
    expect(outcome.kind).toBe('completion')
    if (outcome.kind === 'completion') {
      expect(outcome.script.endsWith("complete -F _tool_completion 'tool'\n")).toBe(true)
    }
    expect(calls).toEqual([])
  })

  test('--completion after a command is an ordinary token', async () => {
    const { dispatcher } = setup()
    const err = await rejection(dispatcher.dispatch(['greet', '--completion']))
    expect(err instanceof TreeError && err.code).toBe('cli.unknown_argument')
  })

  test('empty argv asks for root help', async () => {
    const { dispatcher } = setup()
    const outcome = await dispatcher.dispatch([])
    expect(outcome.kind === 'help' && outcome.node.isRoot).toBe(true)
  })

  test('--help after a path asks for that node\'s help', async () => {
    const { dispatcher, calls } = setup()
    const outcome = await dispatcher.dispatch(['config', '--help'])
    expect(outcome.kind === 'help' && outcome.node.pathString).toBe('config')
    expect(calls).toEqual([])
  })

  test('--help binds normally when the command declares a help parameter', async () => {
    const { dispatcher } = setup()
    const err = await rejection(dispatcher.dispatch(['search', '--help']))
    expect(err instanceof TreeError && err.code).toBe('cli.missing_value')
  })

  test('an unmatched first token is an unknown command', async () => {
    const { dispatcher } = setup()
    const err = await rejection(dispatcher.dispatch(['nope', 'x']))
    expect(ErrUnknownCommand.is(err)).toBe(true)
    if (ErrUnknownCommand.is(err)) {
      expect(err.message).toBe('Unknown command: nope')
      expect(err.data.matched).toBe('')
      expect(err.data.available).toEqual(['greet', 'g', 'cmd', 'config', 'search', 'fail', 'later'])
    }
  })

  test('a grouping node cannot be invoked', async () => {
    const { dispatcher } = setup()
    const err = await rejection(dispatcher.dispatch(['config', 'sett']))
    expect(ErrUnknownCommand.is(err)).toBe(true)
    if (ErrUnknownCommand.is(err)) {
      expect(err.data.command).toBe('config sett')
      expect(err.data.matched).toBe('config')
      expect(err.data.available).toEqual(['set'])
    }
  })

  test('binding errors are tagged with the matched command', async () => {
    const { dispatcher } = setup()
    const err = await rejection(dispatcher.dispatch(['config', 'set', 'k']))
    expect(ErrMissingArgument.is(err)).toBe(true)
    if (ErrMissingArgument.is(err)) {
      expect(err.data).toEqual({ argument: 'value', command: 'config/set' })
      expect(err.prettyPrint()).toBe([
        'error[cli.missing_argument]: Missing required argument: value',
        '  argument: value',
        '  command: config/set',
      ].join('\n'))
    }
  })

  test('handler errors propagate untouched', async () => {
    const { dispatcher } = setup()
    const err = await rejection(dispatcher.dispatch(['fail']))
    expect(err).toBeInstanceOf(Error)
    expect(err instanceof TreeError).toBe(false)
    expect(err instanceof Error && err.message).toBe('handler exploded')
  })

  test('traces matching through the debug logger', async () => {
    const lines: string[] = []
    const { dispatcher } = setup(lines)
    await dispatcher.dispatch(['greet', 'bob'])
    expect(lines).toEqual([
      "[tool:dispatch] matched greet, leftover [ 'bob' ]",
      "[tool:dispatch] invoking greet with { name: 'bob', greeting: 'hello' }",
    ])
  })
})
