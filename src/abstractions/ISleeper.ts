export interface ISleeper {
  sleep(ms: number): Promise<void>;
}
