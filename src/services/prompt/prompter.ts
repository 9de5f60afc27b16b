import { createInterface, type Interface } from 'readline'
import type { Readable, Writable } from 'stream'
import { PromptError } from '../../errors.js'

export interface Prompter {
  /**
   * Ask the user to pick one of `options`. An empty answer picks
   * `defaultValue` when it is one of the options.
   */
  selectOne(message: string, defaultValue: string, options: string[]): Promise<string>
}

/**
 * Prompter reading answers line by line from a terminal or pipe.
 * Questions go to stderr so stdout stays free for generated output.
 * All prompts share one line reader, so answers piped in ahead of their
 * question are kept for it. Call `close` once done to release the input.
 */
export class TerminalPrompter implements Prompter {
  private reader?: { lines: Interface; next: AsyncIterator<string> }

  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stderr
  ) {}

  async selectOne(message: string, defaultValue: string, options: string[]): Promise<string> {
    if (options.length === 0) {
      throw new PromptError(`Nothing to choose from for: ${message}`)
    }
    const fallback = options.includes(defaultValue) ? defaultValue : undefined

    this.output.write(`${message}\n`)
    options.forEach((option, index) => {
      const marker = option === fallback ? ' (default)' : ''
      this.output.write(`  ${index + 1}) ${option}${marker}\n`)
    })
    this.output.write('> ')

    let line = await this.nextLine()
    while (!line.done) {
      const answer = pickOption(line.value.trim(), options, fallback)
      if (answer !== undefined) {
        return answer
      }
      this.output.write(`Please enter a number between 1 and ${options.length}\n> `)
      line = await this.nextLine()
    }
    throw new PromptError(`No answer given for: ${message}`)
  }

  close(): void {
    this.reader?.lines.close()
    this.reader = undefined
  }

  private nextLine(): Promise<IteratorResult<string>> {
    if (!this.reader) {
      const lines = createInterface({ input: this.input, terminal: false })
      this.reader = { lines, next: lines[Symbol.asyncIterator]() }
    }
    return this.reader.next.next()
  }
}

function pickOption(answer: string, options: string[], fallback?: string): string | undefined {
  if (answer === '') {
    return fallback
  }
  if (/^\d+$/.test(answer)) {
    return options[Number(answer) - 1]
  }
  return options.find(option => option === answer)
}
