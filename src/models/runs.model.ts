import { RunState } from "@/interfaces/planner.interface";

export interface RunEntry {
  state: RunState;
  controller: AbortController;
  done: Promise<void>;
}

const runs = new Map<string, RunEntry>();

export default runs;
