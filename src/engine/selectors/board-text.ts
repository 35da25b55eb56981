import type { GameSnapshot } from "../../state/types";

const CELL_WIDTH = 4;

function formatCell(value: number): string {
  return value === 0 ? " ".repeat(CELL_WIDTH) : String(value).padStart(CELL_WIDTH);
}

/**
 * Plain-text rendering of a snapshot for logs and test failure output.
 * Rows print top to bottom, so row 0 is the last board line.
 */
export function formatSnapshot(s: GameSnapshot): string {
  const { board } = s;
  const lines: Array<string> = ["", "["];
  for (let row = board.size - 1; row >= 0; row--) {
    let line = "";
    for (let col = 0; col < board.size; col++) {
      line += `|${formatCell(board.cells[row * board.size + col] ?? 0)}`;
    }
    lines.push(`${line}|`);
  }
  const over = s.status === "over" ? "over" : "not over";
  lines.push(
    `] ${String(s.score)} (max: ${String(s.maxScore)}) (game is ${over}) `,
  );
  return `${lines.join("\n")}\n`;
}
