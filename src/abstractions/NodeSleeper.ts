import { ISleeper } from "./ISleeper";

export class NodeSleeper implements ISleeper {
  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
