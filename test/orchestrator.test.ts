/**
 * Pipeline Orchestrator Tests
 *
 * Drives the orchestrator with a scripted executor: no external tools run,
 * but artifacts and evidence files are written to a real work root.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PipelineOrchestrator } from '../src/pipeline/orchestrator.js';
import { ResultReporter } from '../src/report/reporter.js';
import { defaultToolchain } from '../src/config/toolchain.js';
import type { VerifierConfig } from '../src/config/index.js';
import { StageStatus } from '../src/sandbox/types.js';
import { RunPhase } from '../src/types/pipeline.js';
import {
  FakeStageExecutor,
  engineWith,
  frontendOk,
  lastArg,
  nativeOk,
  passingToolchain,
  translateOk,
  type FakeBehavior,
} from './mocks/fake-executor.js';

describe('PipelineOrchestrator', () => {
  let tempDir: string;
  let workRoot: string;
  let sourceFile: string;
  let lines: string[];

  function makeConfig(overrides: Partial<VerifierConfig> = {}): VerifierConfig {
    return {
      timeouts: {
        frontendSeconds: 60,
        translateSeconds: 120,
        nativeSeconds: 60,
        engineSeconds: 300,
      },
      workRoot,
      translatorPath: '/assert-p4/src/P4_to_C.py',
      ...overrides,
    };
  }

  function makeOrchestrator(
    executor: FakeStageExecutor,
    options: { config?: VerifierConfig; now?: () => number } = {}
  ): PipelineOrchestrator {
    return new PipelineOrchestrator({
      config: options.config ?? makeConfig(),
      toolchain: defaultToolchain(),
      executor,
      reporter: new ResultReporter((line) => lines.push(line)),
      now: options.now ?? (() => 0),
    });
  }

  async function workRootEntries(): Promise<string[]> {
    return fs.readdir(workRoot);
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'orchestrator-test-'));
    workRoot = path.join(tempDir, 'work');
    sourceFile = path.join(tempDir, 'router.p4');
    await fs.writeFile(sourceFile, 'control ingress() { @assert("if(hdr.ipv4.isValid(), hdr.ipv4.ttl > 0)"); }');
    lines = [];
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('clean pass', () => {
    it('should report true when the engine prints its completion marker', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(engineWith({ stdout: 'KLEE: done: total instructions = 42\n' }))
      );

      const outcome = await makeOrchestrator(executor).run({
        sourceFile,
        engineTimeoutSeconds: 300,
      });

      expect(outcome.verdict).toBe('true');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.ruleId).toBe('completed');
      expect(outcome.report.assertion_errors).toBeUndefined();
      expect(outcome.report.details).toBe(
        [
          '=== P4C Compilation ===\n',
          '=== P4 to C Translation ===\nstderr: ',
          '=== Clang Compilation ===\n',
          '=== KLEE Execution ===\nKLEE: done: total instructions = 42\n',
        ].join('\n')
      );
    });

    it('should run the four stages in order', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(engineWith({ stdout: 'KLEE: done: total instructions = 1\n' }))
      );

      await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(executor.commands).toEqual(['p4c-bm2-ss', 'python', 'clang', 'klee']);
    });

    it('should walk the state machine from init to done', async () => {
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.history).toEqual([
        RunPhase.INIT,
        RunPhase.FRONTEND,
        RunPhase.TRANSLATE,
        RunPhase.NATIVE,
        RunPhase.ENGINE,
        RunPhase.CLASSIFY,
        RunPhase.REPORT,
        RunPhase.DONE,
      ]);
    });

    it('should default to true on a clean exit without marker or evidence', async () => {
      const executor = new FakeStageExecutor(passingToolchain(engineWith({ stdout: 'KLEE: output directory\n' })));

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('true');
      expect(outcome.ruleId).toBe('clean-exit');
    });

    it('should emit exactly one document matching the returned report', async () => {
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0] ?? '')).toEqual(outcome.report);
    });
  });

  describe('stage wiring', () => {
    it('should pass artifacts from one stage to the next', async () => {
      let irPath = '';
      let cPath = '';
      let cContent = '';
      let bcPath = '';

      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': async (cmd) => {
          irPath = lastArg(cmd);
          return frontendOk(cmd);
        },
        python: (cmd) => {
          expect(cmd.args).toEqual(['/assert-p4/src/P4_to_C.py', irPath]);
          expect(cmd.cwd).toBe('/assert-p4/src');
          return translateOk(cmd);
        },
        clang: async (cmd) => {
          cPath = cmd.args[3] ?? '';
          cContent = await fs.readFile(cPath, 'utf-8');
          bcPath = lastArg(cmd);
          return nativeOk(cmd);
        },
        klee: engineWith({}),
      });

      await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(path.basename(irPath)).toBe('router.json');
      expect(path.basename(cPath)).toBe('router.c');
      expect(cContent).toBe('int main(void) { return 0; }\n');
      expect(path.basename(bcPath)).toBe('router.bc');
      expect(executor.calls[0]?.args).toEqual([sourceFile, '--toJSON', irPath]);
      expect(executor.calls[2]?.args).toEqual(['-emit-llvm', '-g', '-c', cPath, '-o', bcPath]);
      expect(executor.calls[3]?.args).toEqual([
        '--search=dfs',
        `--output-dir=${path.join(path.dirname(bcPath), 'klee-out')}`,
        '--optimize',
        bcPath,
      ]);
    });

    it('should use the per-stage timeouts and the requested engine budget', async () => {
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 45 });

      expect(executor.calls.map((c) => c.timeoutSeconds)).toEqual([60, 120, 60, 45]);
    });

    it('should pass an existing rules file to the translator', async () => {
      const rulesFile = path.join(tempDir, 'rules.txt');
      await fs.writeFile(rulesFile, 'table_add ipv4_lpm set_nhop 10.0.0.1/32 => 1');
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      await makeOrchestrator(executor).run({ sourceFile, rulesFile, engineTimeoutSeconds: 300 });

      expect(executor.calls[1]?.args.at(-1)).toBe(rulesFile);
    });

    it('should ignore a rules file that does not exist', async () => {
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      await makeOrchestrator(executor).run({
        sourceFile,
        rulesFile: path.join(tempDir, 'missing-rules.txt'),
        engineTimeoutSeconds: 300,
      });

      expect(executor.calls[1]?.args).toHaveLength(2);
    });
  });

  describe('build stage failures', () => {
    it('should report error with the compiler output when the front end fails', async () => {
      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': () => ({ exitCode: 2, stderr: 'router.p4(3): syntax error, unexpected IDENTIFIER\n' }),
      });

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.details).toBe(
        'P4C Compilation failed:\nrouter.p4(3): syntax error, unexpected IDENTIFIER\n'
      );
      expect(executor.calls).toHaveLength(1);
      expect(outcome.history).toEqual([
        RunPhase.INIT,
        RunPhase.FRONTEND,
        RunPhase.REPORT,
        RunPhase.DONE,
      ]);
    });

    it('should use only stderr in translator failure details', async () => {
      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': frontendOk,
        python: () => ({ exitCode: 1, stdout: '/* partial */', stderr: 'KeyError: headers' }),
      });

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.report.details).toBe('P4 to C Translation failed:\nKeyError: headers');
      expect(executor.commands).toEqual(['p4c-bm2-ss', 'python']);
    });

    it('should fail when a stage exits 0 without its artifact', async () => {
      let bcPath = '';
      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': frontendOk,
        python: translateOk,
        clang: (cmd) => {
          bcPath = lastArg(cmd);
          return { stderr: 'warning: unused variable' };
        },
      });

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.details).toBe(
        `Clang Compilation failed:\nwarning: unused variable\nMissing artifact: ${bcPath}`
      );
      expect(executor.calls).toHaveLength(3);
    });

    it('should report a build stage timeout as error', async () => {
      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': () => ({ status: StageStatus.TIMED_OUT, exitCode: null }),
      });

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.details).toBe('P4C Compilation timeout after 60s');
      expect(executor.calls).toHaveLength(1);
    });

    it('should report a tool that cannot be started as error', async () => {
      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': frontendOk,
        python: translateOk,
      });

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.details).toBe('Clang Compilation error: spawn clang ENOENT');
      expect(executor.calls).toHaveLength(3);
    });

    it('should report an aborted run as error without running later stages', async () => {
      const controller = new AbortController();
      controller.abort();
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      const outcome = await makeOrchestrator(executor).run(
        { sourceFile, engineTimeoutSeconds: 300 },
        { signal: controller.signal }
      );

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.details).toBe('P4C Compilation aborted: run interrupted');
      expect(executor.calls).toHaveLength(1);
    });
  });

  describe('engine outcomes', () => {
    it('should report unknown when the engine times out without evidence', async () => {
      const times = [0, 300_000];
      const executor = new FakeStageExecutor(
        passingToolchain(engineWith({ status: StageStatus.TIMED_OUT, exitCode: null }))
      );

      const outcome = await makeOrchestrator(executor, {
        now: () => times.shift() ?? 300_000,
      }).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('unknown');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.report.time_ms).toBe(300_000);
      expect(outcome.report.details).toContain('=== KLEE Execution (Timeout) ===\nTimeout after 300s');
      expect(outcome.report.assertion_errors).toBeUndefined();
    });

    it('should keep partial engine output before the timeout note', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(
          engineWith({ status: StageStatus.TIMED_OUT, exitCode: null, stdout: 'KLEE: WARNING: undefined reference\n' })
        )
      );

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 10 });

      expect(outcome.verdict).toBe('unknown');
      expect(outcome.report.details).toContain(
        '=== KLEE Execution (Timeout) ===\nKLEE: WARNING: undefined reference\n\nTimeout after 10s'
      );
    });

    it('should report false when evidence exists even if the engine timed out', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(
          engineWith(
            { status: StageStatus.TIMED_OUT, exitCode: null },
            { 'test000001.assert.err': 'Error: ASSERTION FAIL: hdr.ipv4.ttl > 0\n' }
          )
        )
      );

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('false');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.ruleId).toBe('violation');
      expect(outcome.report.assertion_errors).toEqual(['Error: ASSERTION FAIL: hdr.ipv4.ttl > 0\n']);
    });

    it('should attach every evidence file in name order', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(
          engineWith(
            { stdout: 'KLEE: done: total instructions = 900\n' },
            {
              'test000002.assert.err': 'Error: ASSERTION FAIL: egress_spec != 0\n',
              'test000001.assert.err': 'Error: ASSERTION FAIL: ttl > 0\n',
              'test000001.ktest': 'binary',
            }
          )
        )
      );

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('false');
      expect(outcome.report.assertion_errors).toEqual([
        'Error: ASSERTION FAIL: ttl > 0\n',
        'Error: ASSERTION FAIL: egress_spec != 0\n',
      ]);
    });

    it('should report false on a failure marker without evidence files', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(engineWith({ stderr: 'KLEE: ERROR: router.c:88: ASSERTION FAIL: 0\n' }))
      );

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('false');
      expect(outcome.report.assertion_errors).toBeUndefined();
    });

    it('should report error with exit code 0 when the engine exits non-zero', async () => {
      const executor = new FakeStageExecutor(
        passingToolchain(engineWith({ exitCode: 1, stderr: 'KLEE: ERROR: failed to load module\n' }))
      );

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.ruleId).toBe('engine-failure');
    });

    it('should report error with exit code 0 when the engine cannot be started', async () => {
      const executor = new FakeStageExecutor({
        'p4c-bm2-ss': frontendOk,
        python: translateOk,
        clang: nativeOk,
      });

      const outcome = await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(0);
      expect(outcome.report.details).toContain('=== KLEE Execution ===\nerror: spawn klee ENOENT');
    });
  });

  describe('work directory', () => {
    const scenarios: Array<[string, Record<string, FakeBehavior>]> = [
      ['success', passingToolchain(engineWith({ stdout: 'KLEE: done: total instructions = 3\n' }))],
      ['early failure', { 'p4c-bm2-ss': () => ({ exitCode: 2, stderr: 'syntax error' }) }],
      ['engine timeout', passingToolchain(engineWith({ status: StageStatus.TIMED_OUT, exitCode: null }))],
      [
        'behavior throwing mid-stage',
        {
          'p4c-bm2-ss': () => {
            throw new Error('tool crashed');
          },
        },
      ],
    ];

    it.each(scenarios)('should remove the work directory after %s', async (_name, behaviors) => {
      const executor = new FakeStageExecutor(behaviors);

      await makeOrchestrator(executor).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(await workRootEntries()).toEqual([]);
    });

    it('should report error when the work directory cannot be created', async () => {
      const blocker = path.join(tempDir, 'not-a-dir');
      await fs.writeFile(blocker, '');
      const executor = new FakeStageExecutor(passingToolchain(engineWith({})));

      const outcome = await makeOrchestrator(executor, {
        config: makeConfig({ workRoot: blocker }),
      }).run({ sourceFile, engineTimeoutSeconds: 300 });

      expect(outcome.verdict).toBe('error');
      expect(outcome.exitCode).toBe(1);
      expect(outcome.report.details).toMatch(/^Pipeline error: /);
      expect(executor.calls).toHaveLength(0);
      expect(lines).toHaveLength(1);
    });
  });

  describe('idempotence', () => {
    it('should produce the same report for the same input', async () => {
      const behaviors = passingToolchain(
        engineWith(
          { stdout: 'KLEE: done: total instructions = 5\n' },
          { 'test000001.assert.err': 'Error: ASSERTION FAIL: ttl > 0\n' }
        )
      );

      const first = await makeOrchestrator(new FakeStageExecutor(behaviors)).run({
        sourceFile,
        engineTimeoutSeconds: 300,
      });
      const second = await makeOrchestrator(new FakeStageExecutor(behaviors)).run({
        sourceFile,
        engineTimeoutSeconds: 300,
      });

      expect(second.report).toEqual(first.report);
      expect(second.runId).not.toBe(first.runId);
    });
  });
});
