import { existsSync, readFileSync } from 'fs';
import { join } from 'path';

const root = join(__dirname, '..', '..', '..');

function readJson(path: string): Record<string, unknown> {
  return JSON.parse(readFileSync(join(root, path), 'utf8'));
}

function stringRecord(value: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (typeof value === 'object' && value !== null) {
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry === 'string') out[key] = entry;
    }
  }
  return out;
}

describe('workspace wiring', () => {
  const scripts = stringRecord(readJson('package.json').scripts);

  it('starts the API from its TypeScript entry point with workspace paths registered', () => {
    expect(scripts.start).toBe('ts-node -r tsconfig-paths/register apps/api/src/main.ts');
    expect(existsSync(join(root, 'apps/api/src/main.ts'))).toBe(true);
  });

  it('maps every workspace package the API depends on to existing sources', () => {
    const tsconfig = readJson('tsconfig.json');
    const compilerOptions = typeof tsconfig.compilerOptions === 'object' ? tsconfig.compilerOptions : null;
    const paths = compilerOptions !== null && 'paths' in compilerOptions ? compilerOptions.paths : undefined;
    const mapped = typeof paths === 'object' && paths !== null ? Object.entries(paths) : [];
    const workspaceDeps = Object.keys(stringRecord(readJson('apps/api/package.json').dependencies)).filter((name) =>
      name.startsWith('@gcpanel/'),
    );

    expect(workspaceDeps.sort()).toEqual(['@gcpanel/schemas', '@gcpanel/types', '@gcpanel/validation']);
    for (const name of workspaceDeps) {
      const entry = mapped.find(([alias]) => alias === name);
      expect(entry).toBeDefined();
      const targets: unknown = entry?.[1];
      const first = Array.isArray(targets) && typeof targets[0] === 'string' ? targets[0] : '';
      expect(existsSync(join(root, first))).toBe(true);
    }
  });
});
