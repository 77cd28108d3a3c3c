import type { Board } from '../domain/Board';
import type { Cell } from '../domain/Cell';
import type { Table } from '../game/Table';

export type CellView =
  | { kind: 'clue'; rowTotal: number; columnTotal: number }
  | { kind: 'playable'; value: number };

export type PublicState = {
  connected: boolean;
  gameName: string;
  rules: string[];
  players: Array<{ name: string; online: boolean }>;
  yourName: string | null;
  grid: CellView[][];
  moveCount: number;
  solved: boolean;
  message: string;
};

export function cellView(cell: Cell): CellView {
  return cell.kind === 'clue'
    ? { kind: 'clue', rowTotal: cell.rowTotal, columnTotal: cell.columnTotal }
    : { kind: 'playable', value: cell.value };
}

export function gridView(board: Board): CellView[][] {
  return board.rows.map(row => row.map(cellView));
}

export function stateFor(table: Table, viewerSocketId: string, connected: boolean): PublicState {
  const you = table.findPlayer(viewerSocketId);
  const game = table.game;

  return {
    connected,
    gameName: game.gameName,
    rules: game.ruleIds,
    players: table.playerList.map(p => ({ name: p.name, online: p.online })),
    yourName: you ? you.name : null,
    grid: gridView(game.board),
    moveCount: game.moveCount,
    solved: game.isSolved,
    message: table.message,
  };
}
