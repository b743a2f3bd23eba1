import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { findExecutable } from '../../src/utils/find-executable';

describe('findExecutable', () => {
  let binDir: string;

  beforeEach(() => {
    binDir = fs.mkdtempSync(path.join(os.tmpdir(), 'find-executable-'));
    fs.writeFileSync(path.join(binDir, 'rclone'), '#!/bin/sh\n', { mode: 0o755 });
    fs.writeFileSync(path.join(binDir, 'notes.txt'), 'plain', { mode: 0o644 });
    fs.mkdirSync(path.join(binDir, 'age'), { mode: 0o755 });
  });

  afterEach(() => {
    fs.rmSync(binDir, { recursive: true, force: true });
  });

  it('finds a bare name on the search path', () => {
    const searchPath = ['', '/nonexistent-dir', binDir].join(path.delimiter);

    expect(findExecutable('rclone', searchPath)).toBe(path.join(binDir, 'rclone'));
  });

  it('returns null for unknown names', () => {
    expect(findExecutable('mongodump', binDir)).toBeNull();
  });

  it('skips files without the execute bit', () => {
    expect(findExecutable('notes.txt', binDir)).toBeNull();
  });

  it('skips directories', () => {
    expect(findExecutable('age', binDir)).toBeNull();
  });

  it('checks paths directly instead of searching', () => {
    expect(findExecutable(path.join(binDir, 'rclone'), '')).toBe(path.join(binDir, 'rclone'));
    expect(findExecutable(path.join(binDir, 'missing'), binDir)).toBeNull();
  });
});
