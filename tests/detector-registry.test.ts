import { DetectorRegistry, createDefaultRegistry } from '../src/detector-registry';
import { SignatureStore } from '../src/signatures/signature-store';
import { customPolicy } from '../src/engine/policies';
import { Detector, DetectionContext, Finding } from '../src/types';
import { Logger } from '../src/utils/logger';
import { makeEvidence, makeFinding } from './helpers/fixtures';

function mockLogger(): jest.Mocked<Logger> {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

function detector(name: string, evaluate: Detector['evaluate']): Detector {
  return { name, method: 'heuristic', description: name, evaluate };
}

const context: DetectionContext = { policy: customPolicy('/scan') };

describe('DetectorRegistry', () => {
  test('flattens findings from every detector in registration order', async () => {
    const first: Finding = makeFinding('heuristic', 2, 'first');
    const second: Finding = makeFinding('ai_model', 5, 'second');
    const registry = new DetectorRegistry()
      .register(detector('One', () => [first]))
      .register(detector('Two', async () => [second]));

    const findings = await registry.evaluateAll(makeEvidence(), context);

    expect(findings).toEqual([first, second]);
  });

  test('a throwing or rejecting detector yields nothing and the rest still run', async () => {
    const logger = mockLogger();
    const ok = makeFinding('heuristic', 3, 'ok');
    const registry = new DetectorRegistry(logger)
      .register(detector('Broken', () => { throw new Error('boom'); }))
      .register(detector('Rejects', () => Promise.reject(new Error('late boom'))))
      .register(detector('Fine', () => [ok]));

    const findings = await registry.evaluateAll(makeEvidence(), context);

    expect(findings).toEqual([ok]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Broken failed on /scan/sample.bin: boom', { detector: 'heuristic' });
    expect(logger.warn).toHaveBeenCalledWith('Rejects failed on /scan/sample.bin: late boom', { detector: 'heuristic' });
  });

  test('detectors receive the scan context', async () => {
    const evaluate = jest.fn((): Finding[] => []);
    await new DetectorRegistry().register(detector('Spy', evaluate)).evaluateAll(makeEvidence(), context);
    expect(evaluate).toHaveBeenCalledWith(expect.objectContaining({ path: '/scan/sample.bin' }), context);
  });

  test('stops waiting on detectors once the signal aborts', async () => {
    const controller = new AbortController();
    const seen: boolean[] = [];
    const registry = new DetectorRegistry()
      .register(detector('Hangs', () => new Promise<Finding[]>(() => {})))
      .register(detector('Cooperative', (_evidence, ctx) => new Promise<Finding[]>((resolve) => {
        ctx.signal?.addEventListener('abort', () => {
          seen.push(true);
          resolve([]);
        }, { once: true });
      })));

    const pending = registry.evaluateAll(makeEvidence(), { ...context, signal: controller.signal });
    controller.abort(new Error('deadline'));

    await expect(pending).rejects.toThrow('deadline');
    expect(seen).toEqual([true]);
  });

  test('an already aborted signal runs no detector', async () => {
    const controller = new AbortController();
    controller.abort(new Error('too late'));
    const evaluate = jest.fn((): Finding[] => []);

    await expect(
      new DetectorRegistry().register(detector('Spy', evaluate)).evaluateAll(makeEvidence(), { ...context, signal: controller.signal }),
    ).rejects.toThrow('too late');
    expect(evaluate).not.toHaveBeenCalled();
  });

  test('getDetectors returns a copy', () => {
    const registry = new DetectorRegistry().register(detector('One', () => []));
    registry.getDetectors().pop();
    expect(registry.getDetectors()).toHaveLength(1);
  });
});

describe('createDefaultRegistry', () => {
  test('registers the four detection methods', () => {
    const registry = createDefaultRegistry({ signatures: SignatureStore.empty() });
    expect(registry.getDetectors().map(d => d.method)).toEqual(['signature', 'heuristic', 'behavioral', 'ai_model']);
  });
});
