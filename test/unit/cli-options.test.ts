import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { parseCliArguments, resolveRunSettings } from '../../src/cli/options.js';
import { parseDirectionChoice } from '../../src/cli/prompt.js';
import { defaultConverterConfig } from '../../src/data/index.js';

describe('parseCliArguments', () => {
  it('reads flags case-insensitively and keeps targets as given', () => {
    const result = parseCliArguments(['-b', '-S', '--BM-TO-AB', 'Data Files/Mod.esp']);

    assert.deepEqual(result, {
      ok: true,
      options: {
        help: false,
        batch: true,
        silent: true,
        noBackup: false,
        direction: 'bm-to-ab',
        targets: ['Data Files/Mod.esp'],
      },
    });
  });

  it('reads the config path and the reverse direction', () => {
    const result = parseCliArguments(['-2', '-c', 'Custom.yaml', '--no-backup', 'a.esp;b.esm']);

    assert.equal(result.ok, true);
    if (result.ok) {
      assert.equal(result.options.direction, 'ab-to-bm');
      assert.equal(result.options.configPath, 'Custom.yaml');
      assert.equal(result.options.noBackup, true);
      assert.deepEqual(result.options.targets, ['a.esp;b.esm']);
    }
  });

  it('refuses both directions at once', () => {
    assert.deepEqual(parseCliArguments(['-1', '-2']), {
      ok: false,
      message: 'Options --bm-to-ab and --ab-to-bm cannot be combined.',
    });
  });

  it('refuses unknown options', () => {
    assert.equal(parseCliArguments(['--verbose']).ok, false);
  });

  it('recognises help', () => {
    const result = parseCliArguments(['--HELP']);
    assert.equal(result.ok && result.options.help, true);
  });
});

describe('resolveRunSettings', () => {
  it('lets flags win over the configuration', () => {
    const config = { ...defaultConverterConfig(), direction: 'ab-to-bm' as const, batch: false, backup: true };
    const parsed = parseCliArguments(['-1', '-b', '--no-backup']);
    assert.ok(parsed.ok);

    const settings = resolveRunSettings(parsed.options, config);

    assert.equal(settings.direction, 'bm-to-ab');
    assert.equal(settings.batch, true);
    assert.equal(settings.backup, false);
  });

  it('falls back to the configured direction', () => {
    const config = { ...defaultConverterConfig(), direction: 'ab-to-bm' as const, silent: true };
    const parsed = parseCliArguments(['mod.esp']);
    assert.ok(parsed.ok);

    const settings = resolveRunSettings(parsed.options, config);

    assert.equal(settings.direction, 'ab-to-bm');
    assert.equal(settings.silent, true);
    assert.equal(settings.backup, true);
  });
});

describe('parseDirectionChoice', () => {
  it('maps the menu answers to directions', () => {
    assert.equal(parseDirectionChoice('1'), 'bm-to-ab');
    assert.equal(parseDirectionChoice(' 2\n'), 'ab-to-bm');
    assert.equal(parseDirectionChoice('3'), undefined);
  });
});
