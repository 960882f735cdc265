import fs from 'fs';
import os from 'os';
import path from 'path';

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { MASK } from './diff.js';
import { ErrorCodes } from './errors.js';
import {
  type RenderOptions,
  renderContent,
  renderTemplate,
  substituteContent,
} from './renderer.js';
import { formatRenderLine } from './report.js';
import { SecretResolver } from './resolver.js';
import { StaticSecretSource } from './secret-source.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'secret-inject-render-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeTemplate(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

function applyOptions(
  values: Record<string, string>,
  extra: Partial<RenderOptions> = {},
): RenderOptions {
  return {
    mode: 'apply',
    resolver: new SecretResolver(new StaticSecretSource(values)),
    ...extra,
  };
}

// --- renderTemplate ---

describe('renderTemplate', () => {
  it('renders a brace-env token into the output file', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');

    const result = await renderTemplate(template, output, applyOptions({ API_KEY: 'abc123' }));

    expect(result.outcome).toBe('written');
    expect(result.format).toBe('env');
    expect(result.tokens).toEqual([{ name: 'API_KEY', status: 'resolved', cached: false }]);
    expect(result.bytes).toBe(13);
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123\n');
  });

  it('leaves an unresolvable simple-env token literal and reports it', async () => {
    const template = writeTemplate('creds.tmpl', 'token=$API_KEY key=$API_SECRET');
    const output = path.join(dir, 'creds');

    const result = await renderTemplate(template, output, applyOptions({ API_KEY: 'abc123' }));

    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123 key=$API_SECRET');
    expect(result.tokens).toEqual([
      { name: 'API_KEY', status: 'resolved', cached: false },
      { name: 'API_SECRET', status: 'missing', reason: 'not-found', detail: undefined },
    ]);
    expect(result.outcome).toBe('written');
  });

  it('substitutes only the higher-priority syntax of a mixed file', async () => {
    const template = writeTemplate(
      'mixed.tpl',
      'a=%%NAME%%\nb={{ op://Vault/NAME/field }}\n',
    );
    const output = path.join(dir, 'mixed');

    const result = await renderTemplate(template, output, applyOptions({ NAME: 'test-secret' }));

    expect(result.format).toBe('go');
    expect(result.otherFormats).toEqual(['custom']);
    expect(fs.readFileSync(output, 'utf-8')).toBe('a=%%NAME%%\nb=test-secret\n');
  });

  it('reports a dry run without touching the filesystem', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');

    const result = await renderTemplate(template, output, {
      ...applyOptions({ API_KEY: 'abc123' }),
      mode: 'dry-run',
    });

    expect(result.outcome).toBe('previewed');
    expect(formatRenderLine(result)).toBe(
      `[DRY RUN] ${template} -> ${output}: would write 13 bytes, 0 missing`,
    );
    expect(fs.readdirSync(dir)).toEqual(['app.conf.template']);
  });

  it('masks resolved values in the preview diff', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');

    const result = await renderTemplate(template, output, {
      ...applyOptions({ API_KEY: 'abc123' }),
      mode: 'dry-run',
    });

    expect(result.diff).toBe(`+token=${MASK}`);
  });

  it('is idempotent: a second render leaves the output unchanged', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    const source = new StaticSecretSource({ API_KEY: 'abc123' });
    const options: RenderOptions = { mode: 'apply', resolver: new SecretResolver(source) };

    await renderTemplate(template, output, options);
    const second = await renderTemplate(template, output, options);

    expect(second.outcome).toBe('unchanged');
    expect(second.changed).toBe(false);
    expect(second.tokens).toEqual([{ name: 'API_KEY', status: 'resolved', cached: true }]);
    expect(source.requested).toEqual(['API_KEY']);
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123\n');
  });

  it('copies a template without tokens through unchanged', async () => {
    const plain = 'Host example\n  User git\n  Port 22\n';
    const template = writeTemplate('ssh_config.template', plain);
    const output = path.join(dir, 'ssh_config');

    const result = await renderTemplate(template, output, applyOptions({}));

    expect(result.format).toBe('none');
    expect(result.tokens).toEqual([]);
    expect(fs.readFileSync(output, 'utf-8')).toBe(plain);
  });

  it('declines to replace a differing destination without consent', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.writeFileSync(output, 'token=old\n');

    const result = await renderTemplate(template, output, applyOptions({ API_KEY: 'abc123' }));

    expect(result.outcome).toBe('declined');
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=old\n');
  });

  it('replaces a differing destination with force', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.writeFileSync(output, 'token=old\n');

    const result = await renderTemplate(
      template,
      output,
      applyOptions({ API_KEY: 'abc123' }, { force: true }),
    );

    expect(result.outcome).toBe('written');
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123\n');
  });

  it('asks before overwriting and shows a masked diff', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.writeFileSync(output, 'token=old\n');
    const confirmOverwrite = vi.fn().mockResolvedValue(true);

    const result = await renderTemplate(
      template,
      output,
      applyOptions({ API_KEY: 'abc123' }, { confirmOverwrite }),
    );

    expect(confirmOverwrite).toHaveBeenCalledWith({
      outputPath: output,
      diff: `-token=old\n+token=${MASK}`,
    });
    expect(result.outcome).toBe('written');
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123\n');
  });

  it('keeps the destination when the overwrite prompt is refused', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.writeFileSync(output, 'token=old\n');

    const result = await renderTemplate(
      template,
      output,
      applyOptions({ API_KEY: 'abc123' }, { confirmOverwrite: async () => false }),
    );

    expect(result.outcome).toBe('declined');
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=old\n');
  });

  it('does not ask when the destination does not exist yet', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const confirmOverwrite = vi.fn().mockResolvedValue(false);

    const result = await renderTemplate(
      template,
      path.join(dir, 'app.conf'),
      applyOptions({ API_KEY: 'abc123' }, { confirmOverwrite }),
    );

    expect(confirmOverwrite).not.toHaveBeenCalled();
    expect(result.outcome).toBe('written');
  });

  it('backs up the previous destination', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.writeFileSync(output, 'token=old\n');

    const result = await renderTemplate(
      template,
      output,
      applyOptions({ API_KEY: 'abc123' }, { force: true, backup: true }),
    );

    expect(result.backupPath).toBe(`${output}.backup`);
    expect(fs.readFileSync(`${output}.backup`, 'utf-8')).toBe('token=old\n');
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123\n');
  });

  it('gives the output the permissions of the template', async () => {
    const template = writeTemplate('key.template', 'key=${KEY}\n');
    fs.chmodSync(template, 0o640);
    const output = path.join(dir, 'key');

    await renderTemplate(template, output, applyOptions({ KEY: 'test-secret' }));

    expect(fs.statSync(output).mode & 0o777).toBe(0o640);
  });

  it('creates missing parent directories of the output', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'nested', 'deeper', 'app.conf');

    const result = await renderTemplate(template, output, applyOptions({ API_KEY: 'abc123' }));

    expect(result.outcome).toBe('written');
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=abc123\n');
  });

  it('reports a failed write without throwing and keeps the destination', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.writeFileSync(output, 'token=old\n');
    // A directory where the backup file should go makes the copy fail
    fs.mkdirSync(`${output}.backup`);

    const result = await renderTemplate(
      template,
      output,
      applyOptions({ API_KEY: 'abc123' }, { force: true, backup: true }),
    );

    expect(result.outcome).toBe('write-failed');
    expect(result.writeError).toEqual(expect.any(String));
    expect(fs.readFileSync(output, 'utf-8')).toBe('token=old\n');
    expect(fs.readdirSync(dir).sort()).toEqual([
      'app.conf',
      'app.conf.backup',
      'app.conf.template',
    ]);
  });

  it('reports an unreadable destination as a failed write', async () => {
    const template = writeTemplate('app.conf.template', 'token=${API_KEY}\n');
    const output = path.join(dir, 'app.conf');
    fs.mkdirSync(output);

    const result = await renderTemplate(
      template,
      output,
      applyOptions({ API_KEY: 'abc123' }, { force: true }),
    );

    expect(result.outcome).toBe('write-failed');
    expect(result.writeError).toMatch(/EISDIR/);
    expect(fs.statSync(output).isDirectory()).toBe(true);
  });

  it('rejects a binary template', async () => {
    const template = writeTemplate('blob.template', 'abc\0def');

    await expect(
      renderTemplate(template, path.join(dir, 'blob'), applyOptions({})),
    ).rejects.toMatchObject({ code: ErrorCodes.BINARY_TEMPLATE });
  });

  it('rejects a missing template', async () => {
    await expect(
      renderTemplate(path.join(dir, 'nope.template'), path.join(dir, 'nope'), applyOptions({})),
    ).rejects.toMatchObject({ code: ErrorCodes.TEMPLATE_NOT_FOUND });
  });
});

// --- renderContent ---

describe('renderContent', () => {
  it('applies the consent rules to in-memory text', async () => {
    const output = path.join(dir, 'out.conf');
    fs.writeFileSync(output, 'hand-edited\n');

    const result = await renderContent(
      'k=${A}\n',
      'stdin',
      output,
      0o600,
      applyOptions({ A: 'x' }, { backup: true }),
    );

    expect(result.templatePath).toBe('stdin');
    expect(result.outcome).toBe('declined');
    expect(fs.readFileSync(output, 'utf-8')).toBe('hand-edited\n');
    expect(fs.existsSync(`${output}.backup`)).toBe(false);
  });

  it('writes with the given permission bits and backs up the old file', async () => {
    const output = path.join(dir, 'out.conf');
    fs.writeFileSync(output, 'hand-edited\n');

    const result = await renderContent(
      'k=${A}\n',
      'stdin',
      output,
      0o600,
      applyOptions({ A: 'x' }, { backup: true, force: true }),
    );

    expect(result.outcome).toBe('written');
    expect(fs.statSync(output).mode & 0o777).toBe(0o600);
    expect(fs.readFileSync(`${output}.backup`, 'utf-8')).toBe('hand-edited\n');
  });
});

// --- substituteContent ---

describe('substituteContent', () => {
  it('reports every token as skipped when secrets are not resolved', async () => {
    const source = new StaticSecretSource({ A: '1' });

    const result = await substituteContent('%%A%% %%B%%', {
      resolver: new SecretResolver(source),
      resolveSecrets: false,
    });

    expect(result.content).toBe('%%A%% %%B%%');
    expect(result.tokens).toEqual([
      { name: 'A', status: 'skipped' },
      { name: 'B', status: 'skipped' },
    ]);
    expect(source.requested).toEqual([]);
  });

  it('honours a forced format', async () => {
    const result = await substituteContent('${A} %%A%%', {
      resolver: new SecretResolver(new StaticSecretSource({ A: 'x' })),
      format: 'custom',
    });

    expect(result.content).toBe('${A} x');
    expect(result.secretValues).toEqual(['x']);
  });
});
