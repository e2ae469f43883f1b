/**
 * CLI Terminal I/O
 *
 * Line-based prompting for the interactive session.
 */

import { createInterface } from 'node:readline'

/**
 * What the interactive session needs from the terminal.
 */
export interface SessionIO {
  /** Show a prompt and read one line. Resolves null once input has ended. */
  prompt(question: string): Promise<string | null>
  /** Print one line of output */
  print(line: string): void
}

export interface TerminalIO extends SessionIO {
  close(): void
}

/**
 * Read lines from an input stream. Lines typed or piped ahead of a prompt are
 * buffered, so piped input works the same as typed input.
 */
export function createTerminalIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): TerminalIO {
  const rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
  const lines = rl[Symbol.asyncIterator]()

  return {
    async prompt(question: string): Promise<string | null> {
      output.write(question)
      const next = await lines.next()
      if (next.done) {
        output.write('\n')
        return null
      }
      return next.value
    },
    print(line: string): void {
      output.write(`${line}\n`)
    },
    close(): void {
      rl.close()
    }
  }
}
