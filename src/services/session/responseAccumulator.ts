/**
 * Collects the incremental text parts of the response in flight
 */
export class ResponseAccumulator {
  private parts: string[] = [];
  private responseId: string | null = null;

  /**
   * Starts a new response sequence, discarding any unfinished one
   */
  begin(responseId: string | null = null): void {
    this.parts = [];
    this.responseId = responseId;
  }

  append(delta: string): void {
    if (delta) this.parts.push(delta);
  }

  get text(): string {
    return this.parts.join("");
  }

  get currentResponseId(): string | null {
    return this.responseId;
  }

  /**
   * Returns the completed text and resets for the next response
   */
  finalize(): string {
    const text = this.text;
    this.reset();
    return text;
  }

  reset(): void {
    this.parts = [];
    this.responseId = null;
  }
}
