import fs from 'fs';
import os from 'os';
import path from 'path';

/** Temp config dir holding `<game>/<game>-board.json` / `-rules.json` for each entry. */
export function writeConfigDir(games: Record<string, { board?: unknown; rules?: unknown; rawBoard?: string }>): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nikoli-conf-'));
  for (const [name, files] of Object.entries(games)) {
    const gameDir = path.join(dir, name);
    fs.mkdirSync(gameDir);
    if (files.rules !== undefined) fs.writeFileSync(path.join(gameDir, `${name}-rules.json`), JSON.stringify(files.rules));
    if (files.rawBoard !== undefined) fs.writeFileSync(path.join(gameDir, `${name}-board.json`), files.rawBoard);
    else if (files.board !== undefined) fs.writeFileSync(path.join(gameDir, `${name}-board.json`), JSON.stringify(files.board));
  }
  return dir;
}

export function removeConfigDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}
