/**
 * ================================================================================
 * VALIDATION UTILITY - Input Validation and Data Processing
 * ================================================================================
 *
 * Format checks and unit parsing shared by the config loader, the platforms
 * and the auxiliary function stage.
 *
 * VALIDATION SCOPE:
 * • Names - regions, service names, function names, image tags
 * • Units - memory ("512Mi", "2Gi", "512MB") and durations ("60s", "2m")
 * • Function Specs - platform-independent rules for one auxiliary function
 */

import type { FunctionSpec } from '../config/types';

/**
 * ================================================================
 * NAME VALIDATION
 * ================================================================
 */

// us-central1, northamerica-northeast1, eu-west-1, ap-southeast-2
const REGION_PATTERN = /^[a-z]{2,}(-[a-z0-9]+)+$/;

// lowercase, starts with a letter, no trailing dash, at most 49 characters
const SERVICE_NAME_PATTERN = /^[a-z]([-a-z0-9]{0,47}[a-z0-9])?$/;

const FUNCTION_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_-]{0,62}$/;

const IMAGE_TAG_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/;

export function isValidRegion(region: string): boolean {
    return REGION_PATTERN.test(region);
}

export function isValidServiceName(name: string): boolean {
    return SERVICE_NAME_PATTERN.test(name);
}

export function isValidFunctionName(name: string): boolean {
    return FUNCTION_NAME_PATTERN.test(name);
}

/**
 * Validate a deployable image tag
 *
 * //! "latest" is rejected: it is only ever a movable alias, never a deploy target
 */
export function isValidImageTag(tag: string): boolean {
    return IMAGE_TAG_PATTERN.test(tag) && tag !== 'latest';
}

/**
 * ================================================================
 * UNIT PARSING
 * ================================================================
 */

const MEMORY_PATTERN = /^(\d+(?:\.\d+)?)\s*(mi|mib|mb|m|gi|gib|gb|g)?$/i;

/**
 * Parse a memory amount into MiB
 *
 * Bare numbers are MiB. Returns null for anything unparseable.
 *
 * @example parseMemoryMb('2Gi') // 2048
 * @example parseMemoryMb('512MB') // 512
 */
export function parseMemoryMb(value: string | number): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }

    const match = MEMORY_PATTERN.exec(value.trim());
    if (!match) {
        return null;
    }

    const amount = Number(match[1]);
    const unit = (match[2] ?? 'mi').toLowerCase();
    return unit.startsWith('g') ? Math.round(amount * 1024) : Math.round(amount);
}

const DURATION_PATTERN = /^(\d+(?:\.\d+)?)\s*(ms|s|m|h)?$/i;

const DURATION_UNITS_MS: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000
};

/**
 * Parse a duration into milliseconds. Bare numbers use the given default unit.
 *
 * @example parseDurationMs('60s') // 60000
 * @example parseDurationMs(5000) // 5000
 */
export function parseDurationMs(value: string | number, defaultUnit: 'ms' | 's' = 'ms'): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value * DURATION_UNITS_MS[defaultUnit] : null;
    }

    const match = DURATION_PATTERN.exec(value.trim());
    if (!match) {
        return null;
    }
    const unit = (match[2] ?? defaultUnit).toLowerCase();
    return Math.round(Number(match[1]) * DURATION_UNITS_MS[unit]);
}

/**
 * Parse an integer-valued setting; strings are accepted for env and CLI input
 */
export function parseInteger(value: string | number): number | null {
    const parsed = typeof value === 'number' ? value : Number(value.trim());
    return Number.isInteger(parsed) ? parsed : null;
}

export function parseNumber(value: string | number): number | null {
    const parsed = typeof value === 'number' ? value : Number(value.trim());
    return value === '' || !Number.isFinite(parsed) ? null : parsed;
}

export function parseBoolean(value: string | boolean): boolean | null {
    if (typeof value === 'boolean') {
        return value;
    }
    switch (value.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
        case '':
            return false;
        default:
            return null;
    }
}

/**
 * ================================================================
 * FUNCTION SPEC VALIDATION
 * ================================================================
 */

/**
 * Platform-independent checks for one auxiliary function
 *
 * Returns a list of problems; empty when the spec is deployable as far as
 * these rules go. Platforms add their own rules on top.
 */
export function validateFunctionSpec(spec: FunctionSpec): string[] {
    const problems: string[] = [];

    if (!isValidFunctionName(spec.name)) {
        problems.push(`name "${spec.name}" is not a valid function name`);
    }
    if (!spec.runtime.trim()) {
        problems.push('runtime is required');
    }
    if (!spec.entryPoint.trim()) {
        problems.push('entry point is required');
    }
    if (!(spec.memoryMb > 0)) {
        problems.push(`memory must be positive (got ${spec.memoryMb})`);
    }
    if (!(spec.timeoutSeconds > 0)) {
        problems.push(`timeout must be positive (got ${spec.timeoutSeconds})`);
    }
    if (spec.region !== undefined && !isValidRegion(spec.region)) {
        problems.push(`region "${spec.region}" is not a valid region`);
    }
    if (spec.trigger.type === 'topic' && !spec.trigger.topic.trim()) {
        problems.push('topic trigger needs a topic name');
    }
    if (spec.trigger.type === 'bucket' && !spec.trigger.bucket.trim()) {
        problems.push('bucket trigger needs a bucket name');
    }

    return problems;
}

/**
 * ================================================================
 * DISPLAY FORMATTING UTILITIES
 * ================================================================
 */

/**
 * Format a duration for the release summary (e.g. "850ms", "42.3s", "3m 12s")
 */
export function formatDuration(durationMs: number): string {
    if (durationMs < 1000) {
        return `${durationMs}ms`;
    }
    if (durationMs < 60_000) {
        return `${(durationMs / 1000).toFixed(1)}s`;
    }
    const minutes = Math.floor(durationMs / 60_000);
    const seconds = Math.floor((durationMs % 60_000) / 1000);
    return `${minutes}m ${seconds}s`;
}
