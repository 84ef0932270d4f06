import { createInterface, type Interface } from "node:readline"

export type PromptIo = {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}

export interface Prompt {
  print(line?: string): void

  /** Resolves with the trimmed answer, or `null` once input has ended. */
  ask(question: string): Promise<string | null>

  close(): void
}

/**
 * Line-based prompt over any pair of streams. Lines are read through the
 * interface's async iterator, which buffers input that arrives before the
 * question is asked.
 */
export class ReadlinePrompt implements Prompt {
  private readonly rl: Interface
  private readonly lines: AsyncIterator<string>

  constructor(private readonly io: PromptIo) {
    this.rl = createInterface({ input: io.input, crlfDelay: Number.POSITIVE_INFINITY })
    this.lines = this.rl[Symbol.asyncIterator]()
  }

  print(line = ""): void {
    this.io.output.write(`${line}\n`)
  }

  async ask(question: string): Promise<string | null> {
    this.io.output.write(question)

    const next = await this.lines.next()
    return next.done ? null : next.value.trim()
  }

  close(): void {
    this.rl.close()
  }
}
