import { describe, test, expect, beforeEach, jest } from '@jest/globals';
import { setImmediate } from 'timers/promises';
import { Orchestrator, WorkerPool, dependencyOrder } from '../Orchestrator.js';
import { Gatekeeper } from '../../Gatekeeper.js';
import { createConfig } from '../../Config.js';
import { AuditLog } from '../../L5/Audit.js';
import { DependencyCycle, InvalidProposal } from '../../Errors.js';
import { makeProposal, MemoryEventStore } from '../../__tests__/fixtures.js';

describe('dependencyOrder', () => {
    test('places dependencies before dependents', () => {
        const ordered = dependencyOrder([
            makeProposal({ proposalId: 'c', dependsOn: ['b'] }),
            makeProposal({ proposalId: 'b', dependsOn: ['a'] }),
            makeProposal({ proposalId: 'a' })
        ]);
        expect(ordered.map(p => p.proposalId)).toEqual(['a', 'b', 'c']);
    });

    test('ignores dependencies outside the batch', () => {
        const ordered = dependencyOrder([makeProposal({ proposalId: 'a', dependsOn: ['elsewhere'] })]);
        expect(ordered.map(p => p.proposalId)).toEqual(['a']);
    });

    test('reports the cycle path', () => {
        expect.assertions(2);
        try {
            dependencyOrder([
                makeProposal({ proposalId: 'a', dependsOn: ['b'] }),
                makeProposal({ proposalId: 'b', dependsOn: ['a'] })
            ]);
        } catch (e) {
            expect(e).toBeInstanceOf(DependencyCycle);
            if (e instanceof DependencyCycle) expect(e.cycle).toEqual(['a', 'b', 'a']);
        }
    });

    test('a self-dependency is a cycle', () => {
        expect(() => dependencyOrder([makeProposal({ proposalId: 'a', dependsOn: ['a'] })])).toThrow(DependencyCycle);
    });

    test('duplicate ids are rejected', () => {
        expect(() => dependencyOrder([makeProposal({ proposalId: 'a' }), makeProposal({ proposalId: 'a' })])).toThrow(InvalidProposal);
    });
});

describe('WorkerPool', () => {
    test('never exceeds its size', async () => {
        const pool = new WorkerPool(2);
        let running = 0;
        let peak = 0;

        const task = async (n: number) => {
            running++;
            peak = Math.max(peak, running);
            await new Promise(resolve => setTimeout(resolve, 5));
            running--;
            return n * 2;
        };

        const results = await Promise.all([1, 2, 3, 4, 5].map(n => pool.run(() => task(n))));
        expect(results).toEqual([2, 4, 6, 8, 10]);
        expect(peak).toBe(2);
        expect(pool.inFlight).toBe(0);
    });

    test('releases the slot when a task throws', async () => {
        const pool = new WorkerPool(1);
        await expect(pool.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
        await expect(pool.run(async () => 'next')).resolves.toBe('next');
        expect(pool.inFlight).toBe(0);
    });
});

describe('Orchestrator', () => {
    let store: MemoryEventStore;
    let orchestrator: Orchestrator;

    beforeEach(() => {
        store = new MemoryEventStore();
        const config = createConfig({ concurrency: 2 });
        orchestrator = new Orchestrator(config, new Gatekeeper(config, new AuditLog(store)));
    });

    test('returns decisions in input order and audits dependencies first', async () => {
        const decisions = await orchestrator.coordinate([
            makeProposal({ proposalId: 'deploy', dependsOn: ['migrate'] }),
            makeProposal({ proposalId: 'migrate' })
        ]);

        expect(decisions.map(d => d.proposalId)).toEqual(['deploy', 'migrate']);
        expect(store.records.map(r => r.decision.proposalId)).toEqual(['migrate', 'deploy']);
    });

    test('enforce-mode rejections come back as decisions', async () => {
        const decisions = await orchestrator.coordinate([
            makeProposal({ proposalId: 'ok' }),
            makeProposal({ proposalId: 'bad', eIndustrial: -1 })
        ], { mode: 'enforce' });

        expect(decisions.map(d => d.overall)).toEqual(['APPROVE', 'REJECT']);
        expect(store.records).toHaveLength(2);
    });

    test('a cycle is rejected before anything is evaluated', async () => {
        await expect(orchestrator.coordinate([
            makeProposal({ proposalId: 'a', dependsOn: ['b'] }),
            makeProposal({ proposalId: 'b', dependsOn: ['a'] })
        ])).rejects.toThrow(DependencyCycle);
        expect(store.records).toHaveLength(0);
    });

    test('malformed members reject the whole batch', async () => {
        await expect(orchestrator.coordinate([makeProposal(), makeProposal({ proposalId: 'p2', entityTrustScore: 1.5 })])).rejects.toThrow(InvalidProposal);
        expect(store.records).toHaveLength(0);
    });

    test('aggregates metrics across batches', async () => {
        await orchestrator.coordinate([
            makeProposal({ proposalId: 'p1' }),
            makeProposal({ proposalId: 'p2', eIndustrial: -1 }),
            makeProposal({ proposalId: 'p3', impactScore: 0.9 })
        ], { mode: 'advise' });
        await orchestrator.coordinate([makeProposal({ proposalId: 'p4', alternativeModels: [] })], { mode: 'observe' });

        const metrics = orchestrator.metrics();
        expect(metrics).toEqual({
            evaluated: 4,
            approved: 1,
            rejected: 2,
            escalated: 1,
            cancelled: 0,
            energyConsumed: 28,
            gateFailures: {
                THERMODYNAMIC_SOLVENCY: 1,
                COGNITIVE_VARIETY: 1,
                HARDWARE_VIABILITY: 0,
                EVIDENCE_SUFFICIENCY: 0,
                VIABILITY_POWER: 0,
                HUMAN_ESCALATION: 0
            }
        });

        metrics.gateFailures.COGNITIVE_VARIETY = 99;
        expect(orchestrator.metrics().gateFailures.COGNITIVE_VARIETY).toBe(1);
    });

    test('a cancelled batch is escalated and counted', async () => {
        const controller = new AbortController();
        controller.abort('shutdown');

        const decisions = await orchestrator.coordinate([
            makeProposal({ proposalId: 'x' }),
            makeProposal({ proposalId: 'y', dependsOn: ['x'] })
        ], { signal: controller.signal });

        expect(decisions.every(d => d.overall === 'ESCALATE_HUMAN' && d.cancelled)).toBe(true);
        expect(decisions[0]?.note).toBe('cancelled before THERMODYNAMIC_SOLVENCY: shutdown');
        expect(orchestrator.metrics().cancelled).toBe(2);
        expect(orchestrator.metrics().energyConsumed).toBe(0);
    });

    test('the configured timeout cancels slow evaluations', async () => {
        jest.useFakeTimers({ doNotFake: ['setImmediate', 'clearImmediate', 'nextTick', 'queueMicrotask'] });
        try {
            const config = createConfig({ timeoutMs: 50 });
            const bounded = new Orchestrator(config, new Gatekeeper(config, new AuditLog(store)));
            const pending = bounded.coordinate([makeProposal({ proposalId: 'slow' })]);
            await setImmediate();
            await setImmediate();
            jest.advanceTimersByTime(50);

            const [decision] = await pending;
            expect(decision?.overall).toBe('ESCALATE_HUMAN');
            expect(decision?.note).toMatch(/^cancelled before [A-Z_]+: timed out after 50ms$/);
            expect(bounded.metrics().cancelled).toBe(1);
            expect(store.records).toHaveLength(1);
        } finally {
            jest.useRealTimers();
        }
    });

    test('single checks and batches share one set of metrics', async () => {
        await orchestrator.Gatekeeper.checkProposal(makeProposal({ proposalId: 'solo' }), 'observe');
        await orchestrator.coordinate([makeProposal({ proposalId: 'batched' })]);
        expect(orchestrator.metrics().evaluated).toBe(2);
    });
});
