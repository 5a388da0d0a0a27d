import type { FunctionSpec } from '../../config/types';
import {
    formatDuration,
    isValidImageTag,
    isValidRegion,
    isValidServiceName,
    parseBoolean,
    parseDurationMs,
    parseInteger,
    parseMemoryMb,
    parseNumber,
    validateFunctionSpec
} from '../validation';

function functionSpec(overrides: Partial<FunctionSpec> = {}): FunctionSpec {
    return {
        name: 'data_processor',
        runtime: 'python39',
        entryPoint: 'process_data',
        memoryMb: 512,
        timeoutSeconds: 60,
        trigger: { type: 'http' },
        source: '/work/functions/data_processor',
        environment: {},
        ...overrides
    };
}

describe('name validation', () => {
    it('accepts GCP and AWS region names', () => {
        expect(isValidRegion('us-central1')).toBe(true);
        expect(isValidRegion('northamerica-northeast1')).toBe(true);
        expect(isValidRegion('eu-west-1')).toBe(true);
    });

    it('rejects malformed regions', () => {
        expect(isValidRegion('')).toBe(false);
        expect(isValidRegion('US-CENTRAL1')).toBe(false);
        expect(isValidRegion('uscentral')).toBe(false);
    });

    it('checks service names', () => {
        expect(isValidServiceName('financial-api')).toBe(true);
        expect(isValidServiceName('a')).toBe(true);
        expect(isValidServiceName('Financial-API')).toBe(false);
        expect(isValidServiceName('api-')).toBe(false);
        expect(isValidServiceName('1api')).toBe(false);
        expect(isValidServiceName('a'.repeat(50))).toBe(false);
    });

    it('never accepts latest as a deploy tag', () => {
        expect(isValidImageTag('20261018-093000000-3f2c1ab')).toBe(true);
        expect(isValidImageTag('v1.2.3')).toBe(true);
        expect(isValidImageTag('latest')).toBe(false);
        expect(isValidImageTag('-leading-dash')).toBe(false);
    });
});

describe('unit parsing', () => {
    it('parses memory amounts into MiB', () => {
        expect(parseMemoryMb('2Gi')).toBe(2048);
        expect(parseMemoryMb('512MB')).toBe(512);
        expect(parseMemoryMb('512Mi')).toBe(512);
        expect(parseMemoryMb('1.5G')).toBe(1536);
        expect(parseMemoryMb('256')).toBe(256);
        expect(parseMemoryMb(1024)).toBe(1024);
        expect(parseMemoryMb('lots')).toBeNull();
    });

    it('parses durations with a default unit', () => {
        expect(parseDurationMs('60s')).toBe(60_000);
        expect(parseDurationMs('2m')).toBe(120_000);
        expect(parseDurationMs('250ms')).toBe(250);
        expect(parseDurationMs(5000)).toBe(5000);
        expect(parseDurationMs('60', 's')).toBe(60_000);
        expect(parseDurationMs(540, 's')).toBe(540_000);
        expect(parseDurationMs('soon')).toBeNull();
    });

    it('parses integers, numbers and booleans from env strings', () => {
        expect(parseInteger('4')).toBe(4);
        expect(parseInteger('4.5')).toBeNull();
        expect(parseNumber('0.5')).toBe(0.5);
        expect(parseNumber('')).toBeNull();
        expect(parseBoolean('yes')).toBe(true);
        expect(parseBoolean('0')).toBe(false);
        expect(parseBoolean('')).toBe(false);
        expect(parseBoolean('maybe')).toBeNull();
    });
});

describe('validateFunctionSpec', () => {
    it('returns no problems for a complete spec', () => {
        expect(validateFunctionSpec(functionSpec())).toEqual([]);
    });

    it('lists every problem at once', () => {
        const problems = validateFunctionSpec(
            functionSpec({ runtime: ' ', entryPoint: '', memoryMb: 0, timeoutSeconds: -1 })
        );
        expect(problems).toEqual([
            'runtime is required',
            'entry point is required',
            'memory must be positive (got 0)',
            'timeout must be positive (got -1)'
        ]);
    });

    it('requires a topic name for topic triggers', () => {
        expect(validateFunctionSpec(functionSpec({ trigger: { type: 'topic', topic: '' } }))).toEqual([
            'topic trigger needs a topic name'
        ]);
    });

    it('checks a per-function region override', () => {
        expect(validateFunctionSpec(functionSpec({ region: 'Mars' }))).toEqual(['region "Mars" is not a valid region']);
    });
});

describe('formatDuration', () => {
    it('picks a unit by magnitude', () => {
        expect(formatDuration(850)).toBe('850ms');
        expect(formatDuration(42_300)).toBe('42.3s');
        expect(formatDuration(192_000)).toBe('3m 12s');
    });
});
