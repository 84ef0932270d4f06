/**
 * Bridges SIGINT to the run in progress. The first interrupt stops the run
 * after its current recipient; with no run in progress (or one already
 * stopping) `interrupt()` returns false and the caller exits.
 */
export class RunInterrupts {
  private current: AbortController | null = null

  begin(): AbortSignal {
    this.current = new AbortController()
    return this.current.signal
  }

  end(): void {
    this.current = null
  }

  interrupt(): boolean {
    if (!this.current || this.current.signal.aborted) return false

    this.current.abort()
    return true
  }
}
