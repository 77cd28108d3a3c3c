import fs from 'fs';
import path from 'path';
import type { ZodType } from 'zod';
import { Board } from '../domain/Board';
import { clueCell, playableCell, type Cell } from '../domain/Cell';
import { OutOfBoundsError } from '../domain/errors';
import { Position } from '../domain/Position';
import { findAnchor } from '../rules/axis';
import { isAxisRule, type Rule } from '../rules/Rule';
import { createRule } from '../rules/RuleRegistry';
import { GameConfigurationError, GameConfigurationNotFoundError, UnknownRuleError, type ConfigurationType } from './errors';
import { boardSchema, rulesSchema, type CellConfig } from './schema';

export const DEFAULT_CONFIG_DIR = path.resolve(__dirname, '..', '..', 'configurationFiles');

const GAME_NAME = /^[a-z0-9-]+$/;

export type GameRules = { gameName: string; rules: Rule[] };

export type GameDefinition = { gameName: string; board: Board; rules: Rule[] };

/**
 * Reads `<configDir>/<game>/<game>-board.json` and `<game>-rules.json`.
 *
 * Boards are checked against the rules they are loaded with: every playable
 * cell must reach a clue walking backward along each rule's axis, so rules
 * never meet an unanchored run while checking moves.
 */
export class ConfigurationReader {
  private cache = new Map<string, GameDefinition>();

  constructor(private readonly configDir: string = DEFAULT_CONFIG_DIR) {}

  readGame(gameName: string): GameDefinition {
    const cached = this.cache.get(gameName);
    if (cached) return cached;

    const { rules } = this.readGameRules(gameName);
    const board = this.readGameBoard(gameName);
    assertRunsAnchored(gameName, board, rules);

    const def = { gameName, board, rules };
    this.cache.set(gameName, def);
    return def;
  }

  readGameRules(gameName: string): GameRules {
    const names = this.readJson(gameName, 'rules', rulesSchema);
    const rules = names.map((name) => {
      try {
        return createRule(name);
      } catch (e) {
        if (e instanceof UnknownRuleError) throw new GameConfigurationError(`${gameName}: ${e.message}`, { cause: e });
        throw e;
      }
    });
    return { gameName, rules };
  }

  readGameBoard(gameName: string): Board {
    const matrix = this.readJson(gameName, 'board', boardSchema);
    const rows = matrix.map(row => row.map(c => toCell(gameName, c)));
    try {
      return new Board(rows);
    } catch (e) {
      throw new GameConfigurationError(`${gameName}: malformed board: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
    }
  }

  private readJson<T>(gameName: string, type: ConfigurationType, schema: ZodType<T>): T {
    if (!GAME_NAME.test(gameName)) throw new GameConfigurationError(`Invalid game name '${gameName}'.`);

    const file = path.join(this.configDir, gameName, `${gameName}-${type}.json`);
    let text: string;
    try {
      text = fs.readFileSync(file, 'utf8');
    } catch {
      throw new GameConfigurationNotFoundError(gameName, type);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      throw new GameConfigurationError(`${gameName}: ${type} file is not valid JSON`, { cause: e });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new GameConfigurationError(`${gameName}: invalid ${type} file${where}: ${issue?.message ?? 'unknown error'}`);
    }
    return parsed.data;
  }
}

function toCell(gameName: string, c: CellConfig): Cell {
  const position = new Position(c.row, c.column);
  if (c.border) {
    if (c.value !== undefined) throw new GameConfigurationError(`${gameName}: clue cell ${position.toString()} cannot hold a value`);
    return clueCell(position, { rowTotal: c.rowTotal, columnTotal: c.columnTotal });
  }
  if (c.rowTotal !== undefined || c.columnTotal !== undefined) {
    throw new GameConfigurationError(`${gameName}: cell ${position.toString()} has totals but is not a border cell`);
  }
  return playableCell(position, c.value ?? 0);
}

function assertRunsAnchored(gameName: string, board: Board, rules: Rule[]) {
  const axes = new Set(rules.filter(isAxisRule).map(r => r.axis));
  for (const axis of axes) {
    for (const cell of board.playableCells()) {
      try {
        findAnchor(board, cell, axis);
      } catch (e) {
        if (!(e instanceof OutOfBoundsError)) throw e;
        throw new GameConfigurationError(
          `${gameName}: cell ${cell.position.toString()} has no clue cell before it along its ${axis}`,
          { cause: e },
        );
      }
    }
  }
}
