import { describe, it, expect, beforeEach } from 'vitest'
import { PassThrough, Readable, Writable } from 'stream'
import { TerminalPrompter } from './prompter.js'
import { PromptError } from '../../errors.js'

function recorder(): { output: Writable; written: () => string } {
  const chunks: string[] = []
  const output = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk))
      callback()
    },
  })
  return { output, written: () => chunks.join('') }
}

describe('TerminalPrompter', () => {
  let output: Writable
  let written: () => string

  beforeEach(() => {
    ;({ output, written } = recorder())
  })

  it('should pick an option by number', async () => {
    const prompter = new TerminalPrompter(Readable.from(['2\n']), output)

    await expect(prompter.selectOne('Which app?', '', ['api', 'frontend'])).resolves.toBe(
      'frontend'
    )
  })

  it('should pick an option by name', async () => {
    const prompter = new TerminalPrompter(Readable.from(['api\n']), output)

    await expect(prompter.selectOne('Which app?', '', ['api', 'frontend'])).resolves.toBe('api')
  })

  it('should take the default on an empty answer', async () => {
    const prompter = new TerminalPrompter(Readable.from(['\n']), output)

    await expect(prompter.selectOne('Which env?', 'test', ['prod', 'test'])).resolves.toBe('test')
  })

  it('should ask again after an invalid answer', async () => {
    const prompter = new TerminalPrompter(Readable.from(['7\nstaging\n1\n']), output)

    const answer = await prompter.selectOne('Which env?', '', ['prod', 'test'])

    expect(answer).toBe('prod')
    expect(written().split('Please enter a number between 1 and 2').length).toBe(3)
  })

  it('should list the options with the default marked', async () => {
    const prompter = new TerminalPrompter(Readable.from(['1\n']), output)

    await prompter.selectOne('Which env?', 'test', ['prod', 'test'])

    expect(written()).toBe('Which env?\n  1) prod\n  2) test (default)\n> ')
  })

  it('should fail when the input ends without an answer', async () => {
    const prompter = new TerminalPrompter(Readable.from(['\n']), output)

    await expect(prompter.selectOne('Which app?', '', ['api'])).rejects.toBeInstanceOf(
      PromptError
    )
  })

  it('should fail without options', async () => {
    const prompter = new TerminalPrompter(Readable.from([]), output)

    await expect(prompter.selectOne('Which app?', '', [])).rejects.toThrow(
      'Nothing to choose from for: Which app?'
    )
  })

  it('should keep answers given ahead of their question', async () => {
    const input = new PassThrough()
    const prompter = new TerminalPrompter(input, output)
    input.write('1\n2\n')

    const app = await prompter.selectOne('Which app?', '', ['api', 'frontend'])
    const env = await prompter.selectOne('Which env?', '', ['test', 'prod'])
    prompter.close()

    expect(app).toBe('api')
    expect(env).toBe('prod')
  })

  it('should fail later prompts once the input has ended', async () => {
    const prompter = new TerminalPrompter(Readable.from(['api\n']), output)

    await expect(prompter.selectOne('Which app?', '', ['api'])).resolves.toBe('api')
    await expect(prompter.selectOne('Which env?', '', ['test'])).rejects.toThrow(
      'No answer given for: Which env?'
    )
  })
})
