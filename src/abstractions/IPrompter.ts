export interface IPrompter {
  /** Whether a person is there to answer. */
  isInteractive(): boolean;
  /** Show a message and wait; resolves false when the user aborts. */
  pause(message: string): Promise<boolean>;
  /** Yes/no question; anything but yes is no. */
  confirm(question: string): Promise<boolean>;
}
