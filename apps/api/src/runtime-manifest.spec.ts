import { readFileSync } from 'fs';
import { join } from 'path';

function readManifest(): unknown {
  return JSON.parse(readFileSync(join(__dirname, '../../../package.json'), 'utf8'));
}

describe('package manifest', () => {
  it('installs the path-alias loader that `npm start` preloads with production dependencies', () => {
    const manifest = readManifest();

    expect(manifest).toMatchObject({
      scripts: { start: expect.stringContaining('-r tsconfig-paths/register') },
      dependencies: { 'tsconfig-paths': expect.any(String) },
    });
    expect(manifest).not.toHaveProperty(['devDependencies', 'tsconfig-paths']);
  });
});
