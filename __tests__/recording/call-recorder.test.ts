import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { gzipSync } from 'zlib';
import { z } from 'zod';
import { CallRecorder } from '../../app/recording/call-recorder.js';
import {
  ContractViolationError,
  NotConfiguredError,
  RecordingIntegrityError,
  ReplayExhaustedError,
} from '../../app/errors.js';

const lookupSchema = z.object({ name: z.string(), score: z.number() });
const numberOrNaN = z.union([z.number(), z.nan()]);

describe('CallRecorder', () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'chunkwire-calls-'));
    path = join(dir, 'calls.gz');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function recordSession(): void {
    const recorder = CallRecorder.live(path);
    let counter = 0;

    expect(recorder.call('counter', () => ++counter, z.number())).toBe(1);
    expect(recorder.call('counter', () => ++counter, z.number())).toBe(2);
    recorder.output.write('result 2\n');

    recorder.nextPart();
    recorder.call('lookup', () => ({ name: 'alpha', score: 0.5 }), lookupSchema);
    recorder.call('ratio', () => NaN, numberOrNaN);
    recorder.output.write('done\n');
    recorder.stop();
  }

  describe('uninitialized', () => {
    it('refuses every operation', () => {
      const recorder = new CallRecorder();
      expect(recorder.modeName).toBe('uninitialized');
      expect(() => recorder.call('site', () => 1, z.number())).toThrow(NotConfiguredError);
      expect(() => recorder.nextPart()).toThrow(NotConfiguredError);
      expect(() => recorder.stop()).toThrow(NotConfiguredError);
      expect(() => recorder.output).toThrow('Call recorder is not in playback or record mode (output)');
    });
  });

  describe('live', () => {
    it('returns results from the real calls', () => {
      recordSession();
    });

    it('refuses a second mode selection', () => {
      const recorder = CallRecorder.live(path);
      expect(recorder.modeName).toBe('live');
      expect(() => recorder.record(join(dir, 'other.gz'))).toThrow(ContractViolationError);
    });

    it('refuses calls after stop', () => {
      const recorder = CallRecorder.live(path);
      recorder.stop();
      expect(() => recorder.call('late', () => 1, z.number())).toThrow(ContractViolationError);
      expect(() => recorder.stop()).toThrow(ContractViolationError);
    });

    it('rejects results that do not match the schema', () => {
      const recorder = CallRecorder.live(path);
      expect(() => recorder.call('count', () => -1, z.number().nonnegative())).toThrow(z.ZodError);
    });
  });

  describe('replay', () => {
    it('returns recorded results without running the calls', () => {
      recordSession();

      const recorder = CallRecorder.replay(path);
      const live = jest.fn(() => 99);
      expect(recorder.modeName).toBe('replay');
      expect(recorder.call('counter', live, z.number())).toBe(1);
      expect(recorder.call('counter', live, z.number())).toBe(2);
      recorder.output.write('result 2\n');

      recorder.nextPart();
      expect(recorder.call('lookup', () => ({ name: '', score: 0 }), lookupSchema)).toEqual({
        name: 'alpha',
        score: 0.5,
      });
      expect(recorder.call('ratio', () => 0, numberOrNaN)).toBeNaN();
      recorder.output.write('done\n');

      expect(() => recorder.stop()).not.toThrow();
      expect(live).not.toHaveBeenCalled();
    });

    it('fails when a call site runs out of results', () => {
      recordSession();

      const recorder = CallRecorder.replay(path);
      recorder.call('counter', () => 0, z.number());
      recorder.call('counter', () => 0, z.number());
      expect(() => recorder.call('counter', () => 0, z.number())).toThrow(ReplayExhaustedError);
      expect(() => recorder.call('lookup', () => 0, z.number())).toThrow(ReplayExhaustedError);
    });

    it('fails when the replayed output differs', () => {
      recordSession();

      const recorder = CallRecorder.replay(path);
      recorder.output.write('result 3\n');
      expect(() => recorder.stop()).toThrow(RecordingIntegrityError);
    });

    it('fails when a recorded result no longer fits its schema', () => {
      recordSession();

      const recorder = CallRecorder.replay(path);
      expect(() => recorder.call('counter', () => '', z.string())).toThrow(RecordingIntegrityError);
    });

    it('fails when asked for more parts than were recorded', () => {
      recordSession();

      const recorder = CallRecorder.replay(path);
      recorder.nextPart();
      expect(() => recorder.nextPart()).toThrow(RecordingIntegrityError);
    });

    it('refuses use after stop', () => {
      recordSession();

      const recorder = CallRecorder.replay(path);
      recorder.call('counter', () => 0, z.number());
      recorder.call('counter', () => 0, z.number());
      recorder.output.write('result 2\n');
      recorder.nextPart();
      recorder.output.write('done\n');
      recorder.stop();

      expect(() => recorder.call('lookup', () => ({ name: '', score: 0 }), lookupSchema)).toThrow(
        ContractViolationError
      );
      expect(() => recorder.nextPart()).toThrow(ContractViolationError);
      expect(() => recorder.stop()).toThrow(ContractViolationError);
    });

    it('rejects files that are not call recordings', () => {
      writeFileSync(path, gzipSync('{"version":2}'));
      expect(() => CallRecorder.replay(path)).toThrow(RecordingIntegrityError);
    });
  });
});
