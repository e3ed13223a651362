import { describe, it, expect } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from '../../src/config';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'pii-veil-config-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

describe('Config loader', () => {
  it('loads YAML config and merges profiles', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(
        configPath,
        [
          'guard:',
          '  detectors: [regex]',
          '  policyPath: ./policies/team.yaml',
          '  overlapStrategy: highest-confidence',
          'server:',
          '  port: 4100',
          'logging:',
          '  level: warn',
          'profiles:',
          '  strict:',
          '    guard:',
          '      detectors: [regex, enhanced_regex]',
          '      policy: gdpr_strict',
          '    server:',
          '      host: 127.0.0.1',
          '',
        ].join('\n'),
      );

      const base = await loadConfig(configPath);
      expect(base.guard).toEqual({
        detectors: ['regex'],
        policyPath: join(dir, 'policies', 'team.yaml'),
        overlapStrategy: 'highest-confidence',
      });
      expect(base.server).toEqual({ port: 4100 });
      expect(base.logging).toEqual({ level: 'warn' });

      const strict = await loadConfig(configPath, 'strict');
      expect(strict.guard).toEqual({
        detectors: ['regex', 'enhanced_regex'],
        policy: 'gdpr_strict',
        overlapStrategy: 'highest-confidence',
      });
      expect(strict.server).toEqual({ port: 4100, host: '127.0.0.1' });
    });
  });

  it('reads TOML and JSON with custom patterns', async () => {
    await withTempDir(async (dir) => {
      const tomlPath = join(dir, 'config.toml');
      await writeFile(
        tomlPath,
        `[guard]\npolicy = "pci_dss"\n\n[[guard.customPatterns]]\nentityType = "EMPLOYEE_ID"\npattern = "EMP-\\\\d{6}"\nconfidence = 0.9\n`,
      );
      const fromToml = await loadConfig(tomlPath);
      expect(fromToml.guard.customPatterns).toEqual([
        { entityType: 'EMPLOYEE_ID', pattern: 'EMP-\\d{6}', confidence: 0.9 },
      ]);

      const jsonPath = join(dir, 'config.json');
      await writeFile(jsonPath, JSON.stringify({ guard: { validateMatches: true } }));
      expect((await loadConfig(jsonPath)).guard).toEqual({ validateMatches: true });
    });
  });

  it('throws when guard section is missing', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'broken.toml');
      await writeFile(configPath, `[server]\nport = 4000\n`);

      await expect(loadConfig(configPath)).rejects.toThrow(/guard/);
    });
  });

  it('rejects invalid values and unknown profiles', async () => {
    await withTempDir(async (dir) => {
      const configPath = join(dir, 'config.yaml');
      await writeFile(configPath, 'guard:\n  overlapStrategy: first-wins\n');
      await expect(loadConfig(configPath)).rejects.toThrow(/overlapStrategy "first-wins" is not one of/);

      await writeFile(configPath, 'guard:\n  policy: default_pii\nlogging:\n  level: loud\n');
      await expect(loadConfig(configPath)).rejects.toThrow(/Unsupported log level "loud"/);

      await writeFile(configPath, 'guard:\n  policy: default_pii\n');
      await expect(loadConfig(configPath, 'ci')).rejects.toThrow('Profile ci not found in config');
    });
  });
});
