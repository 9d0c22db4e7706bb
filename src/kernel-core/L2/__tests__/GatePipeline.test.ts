import { describe, test, expect } from '@jest/globals';
import { setImmediate } from 'timers/promises';
import { GatePipeline } from '../GatePipeline.js';
import type { PipelineContext } from '../GatePipeline.js';
import { createConfig, DEFAULT_CONFIG, GIB } from '../../Config.js';
import { EnergyBudget } from '../../L0/EnergyBudget.js';
import { makeProposal } from '../../__tests__/fixtures.js';

const enforce: PipelineContext = { config: DEFAULT_CONFIG, phase: 'Genesis', mode: 'enforce' };
const observe: PipelineContext = { ...enforce, mode: 'observe' };

describe('GatePipeline', () => {
    const pipeline = new GatePipeline();

    test('runs all six gates in order for a clean proposal', async () => {
        const budget = EnergyBudget.open(100);
        const run = await pipeline.run(makeProposal(), enforce, budget);
        expect(run.results.map(r => r.gateId)).toEqual([1, 2, 3, 4, 5, 6]);
        expect(run.results.every(r => r.outcome === 'PASS')).toBe(true);
        expect(run.fatal).toBe(false);
        expect(budget.spent).toBe(7);
    });

    test('non-fatal failures do not stop later gates', async () => {
        const run = await pipeline.run(makeProposal({ eIndustrial: -50, alternativeModels: [] }), enforce, EnergyBudget.open(100));
        expect(run.results).toHaveLength(6);
        expect(run.results.filter(r => r.outcome === 'FAIL').map(r => r.gate)).toEqual(['THERMODYNAMIC_SOLVENCY', 'COGNITIVE_VARIETY']);
    });

    test('hardware failure short-circuits in enforce mode', async () => {
        const run = await pipeline.run(makeProposal({ estimatedMemoryBytes: 4 * GIB }), enforce, EnergyBudget.open(100));
        expect(run.results.map(r => r.gateId)).toEqual([1, 2, 3]);
        expect(run.results[2]?.outcome).toBe('FAIL');
        expect(run.fatal).toBe(true);
    });

    test('hardware failure does not short-circuit in observe mode', async () => {
        const run = await pipeline.run(makeProposal({ estimatedMemoryBytes: 4 * GIB }), observe, EnergyBudget.open(100));
        expect(run.results).toHaveLength(6);
        expect(run.fatal).toBe(false);
    });

    test('budget exhaustion becomes a FAIL on the gate that was charging', async () => {
        // Gates 1-3 cost 3; gate 4 needs 2 more with one evidence item
        const budget = EnergyBudget.open(4);
        const run = await pipeline.run(makeProposal(), enforce, budget);
        expect(run.budgetExhausted).toBe(true);
        expect(run.results.map(r => r.outcome)).toEqual(['PASS', 'PASS', 'PASS', 'FAIL']);
        expect(run.results[3]?.gate).toBe('EVIDENCE_SUFFICIENCY');
        expect(run.results[3]?.message.startsWith('energy budget exceeded')).toBe(true);
        expect(run.results[3]?.energySpent).toBe(0);
        expect(budget.spent).toBe(3);
    });

    test('cancellation is checked before the first gate', async () => {
        const controller = new AbortController();
        controller.abort(new Error('operator stop'));
        const run = await pipeline.run(makeProposal(), enforce, EnergyBudget.open(100), controller.signal);
        expect(run.results).toHaveLength(0);
        expect(run.cancelledAt).toBe('THERMODYNAMIC_SOLVENCY');
        expect(run.cancelReason).toBe('operator stop');
    });

    test('cancellation between gates reports the next gate and keeps earlier results', async () => {
        const controller = new AbortController();
        const running = pipeline.run(makeProposal(), enforce, EnergyBudget.open(100), controller.signal);
        // Gates 1 and 2 run on the next two turns of the event loop
        await setImmediate();
        await setImmediate();
        controller.abort('operator stop');

        const run = await running;
        expect(run.results.map(r => r.gateId)).toEqual([1, 2]);
        expect(run.cancelledAt).toBe('HARDWARE_VIABILITY');
        expect(run.cancelReason).toBe('operator stop');
    });

    test('is deterministic for identical inputs', async () => {
        const proposal = makeProposal({ rAbsolute: 0.1, viabilityPowerClaim: 4, impactScore: 0.95 });
        const a = await pipeline.run(proposal, enforce, EnergyBudget.open(100));
        const b = await pipeline.run(proposal, enforce, EnergyBudget.open(100));
        expect(a).toEqual(b);
    });

    test('respects configured gate costs', async () => {
        const config = createConfig({ gateCosts: { base: { 1: 5 }, perEvidenceItem: 2 } });
        const budget = EnergyBudget.open(100);
        await pipeline.run(makeProposal(), { ...enforce, config }, budget);
        // 5 + 1 + 1 + (1 + 2) + 1 + 1
        expect(budget.spent).toBe(12);
    });
});
