// Per-tilt record of which canonical cells already took a merge

export type MoveTrace = {
  readonly size: number;
  readonly merged: Uint8Array;
};

export function createMoveTrace(size: number): MoveTrace {
  return { merged: new Uint8Array(size * size), size };
}

export function markMerged(trace: MoveTrace, col: number, row: number): void {
  trace.merged[row * trace.size + col] = 1;
}

export function wasMerged(trace: MoveTrace, col: number, row: number): boolean {
  return trace.merged[row * trace.size + col] === 1;
}
