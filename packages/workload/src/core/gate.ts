/**
 * Single-use latch. The first `open(value)` resolves every waiter with
 * `value`; later calls change nothing.
 */
export class Gate<T> {
  private opened = false
  private release: (value: T) => void = () => {}
  readonly wait: Promise<T>

  constructor() {
    this.wait = new Promise<T>((resolve) => {
      this.release = resolve
    })
  }

  /** Returns `true` for the call that opened the gate. */
  open(value: T): boolean {
    if (this.opened) return false

    this.opened = true
    this.release(value)

    return true
  }

  get isOpen(): boolean {
    return this.opened
  }
}
