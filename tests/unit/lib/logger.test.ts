/**
 * Unit tests for the Logger
 */

import { describe, it, mock, afterEach } from 'node:test';
import assert from 'node:assert';

import { ConfigError } from '../../../src/core/errors.js';
import { Logger } from '../../../src/lib/logger.js';

describe('Logger', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  describe('json mode', () => {
    it('should start successful with no warnings', () => {
      assert.deepStrictEqual(new Logger('json').getJsonBuffer(), { success: true, warnings: [] });
    });

    it('should collect command, data and warnings', () => {
      const log = new Logger('json');
      log.setCommand('deploy');
      log.addData('machines', ['web']);
      log.warning('disk is gone');

      assert.deepStrictEqual(log.getJsonBuffer(), {
        success: true,
        command: 'deploy',
        data: { machines: ['web'] },
        warnings: ['disk is gone'],
      });
    });

    it('should record errors with their code and suggestion', () => {
      const log = new Logger('json');
      log.error('bad file', new ConfigError('bad file', 'CONFIG_NOT_FOUND', 'Check the path.'));

      assert.strictEqual(log.getJsonBuffer().success, false);
      assert.deepStrictEqual(log.getJsonBuffer().error, {
        code: 'CONFIG_NOT_FOUND',
        message: 'bad file',
        suggestion: 'Check the path.',
      });
    });

    it('should record validation issues as details', () => {
      const log = new Logger('json');
      log.validationError([{ path: '/machines', message: 'must be array' }]);

      assert.deepStrictEqual(log.getJsonBuffer().error, {
        code: 'CONFIG_VALIDATION_FAILED',
        message: 'Configuration is invalid',
        details: [{ path: '/machines', message: 'must be array' }],
      });
    });

    it('should print nothing but the final document', () => {
      const log = new Logger('json');
      const out = mock.method(console, 'log', () => {});
      log.info('hidden');
      log.action('hidden');
      log.setCommand('check');
      log.flush();

      assert.strictEqual(out.mock.callCount(), 1);
      assert.deepStrictEqual(out.mock.calls[0]?.arguments, [
        JSON.stringify({ success: true, warnings: [], command: 'check' }, null, 2),
      ]);
    });
  });

  describe('human mode', () => {
    it('should prefix lines with the machine name', () => {
      const log = new Logger('human');
      const out = mock.method(console, 'log', () => {});
      log.setMachine('web');
      log.action('starting Azure machine...');
      log.setMachine(null);
      log.success('done');

      assert.deepStrictEqual(
        out.mock.calls.map((call) => call.arguments[0]),
        ['→ web: starting Azure machine...', '✓ done']
      );
    });

    it('should buffer warnings with the machine prefix', () => {
      const log = new Logger('human');
      const err = mock.method(console, 'warn', () => {});
      log.setMachine('db');
      log.warning('disk is gone');

      assert.deepStrictEqual(log.getWarnings(), ['db: disk is gone']);
      assert.deepStrictEqual(err.mock.calls[0]?.arguments, ['⚠ db: disk is gone']);
    });

    it('should indent nested output', () => {
      const log = new Logger('human');
      const out = mock.method(console, 'log', () => {});
      log.indent();
      log.info('nested');
      log.dedent();
      log.dedent();
      log.info('top');

      assert.deepStrictEqual(
        out.mock.calls.map((call) => call.arguments[0]),
        ['  nested', 'top']
      );
    });

    it('should pad table columns to their widest cell', () => {
      const log = new Logger('human');
      const out = mock.method(console, 'log', () => {});
      log.table(['NAME', 'STATE'], [['web', 'Up'], ['database', 'Down']]);

      assert.deepStrictEqual(
        out.mock.calls.map((call) => call.arguments[0]),
        ['NAME      STATE', 'web       Up   ', 'database  Down ']
      );
    });

    it('should print the suggestion under an error', () => {
      const log = new Logger('human');
      const err = mock.method(console, 'error', () => {});
      log.error('bad file', new ConfigError('bad file', 'CONFIG_NOT_FOUND', 'Check the path.'));

      assert.deepStrictEqual(
        err.mock.calls.map((call) => call.arguments[0]),
        ['✗ bad file', '  Fix: Check the path.']
      );
    });
  });

  describe('fromOptions', () => {
    it('should pick json mode from the --json flag', () => {
      assert.strictEqual(Logger.fromOptions({ json: true }).getMode(), 'json');
      assert.strictEqual(Logger.fromOptions({}).getMode(), 'human');
    });
  });
});
