export const DEFAULT_BUFFER_MAX_LINES = 20;

/**
 * Bounded, ordered transcript of one group's chatter while a proactive timer
 * is running. Once full, further lines are dropped rather than evicting older
 * ones, so the decision sees the start of the burst.
 */
export class ChatBuffer {
  private lines: string[] = [];

  constructor(private readonly maxLines: number = DEFAULT_BUFFER_MAX_LINES) {
    if (!Number.isInteger(maxLines) || maxLines < 1) {
      throw new RangeError(`ChatBuffer maxLines must be a positive integer (got ${maxLines})`);
    }
  }

  public get size(): number {
    return this.lines.length;
  }

  public get isFull(): boolean {
    return this.lines.length >= this.maxLines;
  }

  /** Returns false when the line was dropped because the buffer is full. */
  public push(line: string): boolean {
    if (this.isFull) return false;
    this.lines.push(line);
    return true;
  }

  public drain(): string[] {
    const out = this.lines;
    this.lines = [];
    return out;
  }

  public clear(): void {
    this.lines = [];
  }
}

export const formatChatLine = (senderName: string, text: string): string =>
  `${senderName.trim() || 'someone'}: ${text}`;
