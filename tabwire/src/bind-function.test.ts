import { describe, test, expect } from 'vitest'
import { bindFunction } from './bind-function.js'
import { ArgumentMismatchError, ArgumentTypeError } from './errors.js'

const isNumberPair = (args: unknown[]): args is [number, number] =>
  typeof args[0] === 'number' && typeof args[1] === 'number'

const context = { name: 'add', signal: new AbortController().signal }

describe('bindFunction', () => {
  const add = bindFunction((a: number, b: number) => a + b, isNumberPair)

  test('calls the function with the decoded arguments', async () => {
    await expect(add([2, 3], context)).resolves.toBe(5)
  })

  test('awaits async functions', async () => {
    const slow = bindFunction(async (a: number, b: number) => a * b, isNumberPair)
    await expect(slow([4, 5], context)).resolves.toBe(20)
  })

  test('rejects a wrong argument count', async () => {
    await expect(add([1, 2, 3], context)).rejects.toThrow(ArgumentMismatchError)
    await expect(add([1, 2, 3], context)).rejects.toThrow('Function arguments mismatch: expected 2, got 3')
  })

  test('rejects arguments the guard refuses', async () => {
    await expect(add(['foo', 'bar'], context)).rejects.toThrow(ArgumentTypeError)
  })

  test('errors thrown by the function propagate', async () => {
    const failing = bindFunction(
      (value: string): string => {
        throw new Error(`cannot handle ${value}`)
      },
      (args): args is [string] => typeof args[0] === 'string',
    )
    await expect(failing(['x'], context)).rejects.toThrow('cannot handle x')
  })
})
