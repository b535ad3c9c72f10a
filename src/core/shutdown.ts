/**
 * One-shot, process-wide shutdown broadcast.
 *
 * Listeners run synchronously inside `trigger()`, so once it returns every activity has observed
 * the signal.
 */
export class ShutdownSignal {
  private controller = new AbortController()

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get triggered(): boolean {
    return this.controller.signal.aborted
  }

  get reason(): string | undefined {
    const reason: unknown = this.controller.signal.reason
    return typeof reason === 'string' ? reason : undefined
  }

  /**
   * Fire the signal. Returns false if it had already fired.
   */
  trigger(reason = 'shutdown'): boolean {
    if (this.triggered) return false
    this.controller.abort(reason)
    return true
  }

  /**
   * Run `listener` when the signal fires, or right away if it already has.
   * Returns a function that detaches the listener.
   */
  onTrigger(listener: () => void): () => void {
    if (this.triggered) {
      listener()
      return () => {}
    }
    this.controller.signal.addEventListener('abort', listener, { once: true })
    return () => this.controller.signal.removeEventListener('abort', listener)
  }
}
