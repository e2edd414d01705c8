jest.mock('chalk', () => ({ __esModule: true, default: new Proxy({}, { get: () => (s: string) => s }) }));
import fs from 'fs';
import os from 'os';
import path from 'path';
import { CommanderError } from 'commander';
import { createCLI, runScaffold } from '../scaffold';

describe('scaffold CLI', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scaffold-cli-test-'));
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('runScaffold', () => {
    it('returns 0 and announces the generated project', async () => {
      const code = await runScaffold({ root: tempDir, name: 'my-service', force: false }, false);

      const projectDir = path.join(tempDir, 'my-service');
      expect(code).toBe(0);
      expect(fs.readFileSync(path.join(projectDir, 'src', 'main.py'), 'utf-8')).toContain('title="my-service"');
      expect(console.log).toHaveBeenCalledWith(`Project generated at: ${projectDir}`);
    });

    it('returns 1 and prints the reason for an invalid name', async () => {
      const code = await runScaffold({ root: tempDir, name: 'a/b', force: false }, false);

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith('Error: Invalid project name "a/b": name must not contain path separators');
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });

    it('returns 1 naming the path when the target is not empty', async () => {
      const projectDir = path.join(tempDir, 'svc');
      fs.mkdirSync(projectDir);
      fs.writeFileSync(path.join(projectDir, 'keep.txt'), 'mine');

      const code = await runScaffold({ root: tempDir, name: 'svc', force: false }, false);

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(`Error: Target path already exists and is not empty: ${projectDir}`);
      expect(fs.readdirSync(projectDir)).toEqual(['keep.txt']);
    });

    it('returns 1 when the template directory has no manifest', async () => {
      const emptyTemplate = path.join(tempDir, 'no-template');
      const code = await runScaffold({ root: tempDir, name: 'svc', force: false }, false, emptyTemplate);

      expect(code).toBe(1);
      expect(console.error).toHaveBeenCalledWith(
        `Error: Invalid scaffold manifest ${path.join(emptyTemplate, 'manifest.yaml')}: file not found`
      );
    });
  });

  describe('createCLI', () => {
    it('parses --path and --name and sets a zero exit code', async () => {
      await createCLI().parseAsync(['node', 'ddd-scaffold', '--path', tempDir, '--name', 'svc']);

      expect(process.exitCode).toBe(0);
      expect(fs.existsSync(path.join(tempDir, 'svc', 'tests', 'api', 'test_health.py'))).toBe(true);
    });

    it('accepts the short flags', async () => {
      await createCLI().parseAsync(['node', 'ddd-scaffold', '-p', tempDir, '-n', 'svc', '-v']);

      expect(process.exitCode).toBe(0);
      expect(console.log).toHaveBeenCalledWith('  created src');
    });

    it('sets a non-zero exit code on a second run without --force', async () => {
      const argv = ['node', 'ddd-scaffold', '--path', tempDir, '--name', 'svc'];
      await createCLI().parseAsync(argv);
      await createCLI().parseAsync(argv);

      expect(process.exitCode).toBe(1);
    });

    it('succeeds on a second run with --force', async () => {
      const argv = ['node', 'ddd-scaffold', '--path', tempDir, '--name', 'svc'];
      await createCLI().parseAsync(argv);
      await createCLI().parseAsync([...argv, '--force']);

      expect(process.exitCode).toBe(0);
    });

    it('requires --name', async () => {
      const program = createCLI()
        .exitOverride()
        .configureOutput({ writeErr: () => {} });

      const error = await program.parseAsync(['node', 'ddd-scaffold', '--path', tempDir]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommanderError);
      expect(error).toMatchObject({ code: 'commander.missingMandatoryOptionValue', exitCode: 1 });
      expect(fs.readdirSync(tempDir)).toEqual([]);
    });
  });
});
