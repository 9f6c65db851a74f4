/**
 * @module waveform/config
 * @description Device profiles and synthesis configuration
 */

import { InvalidParameterError } from '../core/errors';
import { ConsoleLogger } from '../core/logging';
import type { ValidationResult } from '../core/repro';
import type { DeviceProfile, SynthesisConfig } from './types';

// ==================== Device Profiles ====================

/**
 * Known waveform-memory constraints.
 *
 * Sample-rate limits are the instruments' nominal DAC/baseband ranges.
 */
export const DEVICE_PROFILES = {
    /** No constraint; useful for analysis and tests */
    generic: {
        name: 'generic',
        minLength: 1,
        granularity: 1,
        minSampleRate: 0,
        maxSampleRate: Infinity,
    },
    /** M8190A, 14-bit precision mode */
    'm8190a-14bit': {
        name: 'M8190A 14-bit',
        minLength: 240,
        granularity: 48,
        minSampleRate: 125e6,
        maxSampleRate: 8e9,
    },
    /** M8190A, 12-bit speed mode */
    'm8190a-12bit': {
        name: 'M8190A 12-bit',
        minLength: 320,
        granularity: 64,
        minSampleRate: 125e6,
        maxSampleRate: 12e9,
    },
    /** M8190A, digital up-conversion (interpolated) modes */
    'm8190a-duc': {
        name: 'M8190A DUC',
        minLength: 120,
        granularity: 24,
        minSampleRate: 125e6 / 48,
        maxSampleRate: 7.2e9 / 3,
    },
    'm8195a': {
        name: 'M8195A',
        minLength: 256,
        granularity: 256,
        minSampleRate: 53.76e9,
        maxSampleRate: 65e9,
    },
    /** N5182B-class vector signal generator baseband */
    vsg: {
        name: 'VSG baseband',
        minLength: 60,
        granularity: 2,
        minSampleRate: 1e3,
        maxSampleRate: 200e6,
    },
    /** UXG N5194A vector adapter */
    'uxg-vector': {
        name: 'UXG vector',
        minLength: 60,
        granularity: 4,
        minSampleRate: 1e3,
        maxSampleRate: 250e6,
    },
} as const satisfies Record<string, DeviceProfile>;

export type DeviceProfileName = keyof typeof DEVICE_PROFILES;

/**
 * Look up a profile from the catalogue
 */
export function getDeviceProfile(name: DeviceProfileName): DeviceProfile {
    return { ...DEVICE_PROFILES[name] };
}

/**
 * Check a device profile without throwing
 */
export function validateDeviceProfile(profile: DeviceProfile): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Number.isInteger(profile.granularity) || profile.granularity < 1) {
        errors.push(`granularity must be a positive integer, got ${profile.granularity}`);
    }
    if (!Number.isInteger(profile.minLength) || profile.minLength < 1) {
        errors.push(`minLength must be a positive integer, got ${profile.minLength}`);
    }
    if (!(profile.minSampleRate >= 0)) {
        errors.push(`minSampleRate must be >= 0, got ${profile.minSampleRate}`);
    }
    if (!(profile.maxSampleRate > profile.minSampleRate)) {
        errors.push('maxSampleRate must exceed minSampleRate');
    }
    if (profile.maxLength !== undefined) {
        if (!Number.isInteger(profile.maxLength) || profile.maxLength < profile.minLength) {
            errors.push(`maxLength must be an integer >= minLength, got ${profile.maxLength}`);
        }
    }
    if (errors.length === 0 && profile.minLength % profile.granularity !== 0) {
        warnings.push(
            `minLength ${profile.minLength} is not a multiple of granularity ${profile.granularity}; ` +
            'corrected lengths round it up'
        );
    }

    return { valid: errors.length === 0, errors, warnings };
}

// ==================== Synthesis Configuration ====================

export const DEFAULT_SYNTHESIS_CONFIG: SynthesisConfig = {
    device: DEVICE_PROFILES.generic,
    maxExtensionFactor: 2,
    seed: 42,
    logger: new ConsoleLogger('warn'),
};

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveSynthesisConfig(overrides: Partial<SynthesisConfig> = {}): SynthesisConfig {
    const config: SynthesisConfig = { ...DEFAULT_SYNTHESIS_CONFIG, ...overrides };

    const check = validateDeviceProfile(config.device);
    if (!check.valid) {
        throw new InvalidParameterError('device', check.errors.join('; '), check.errors);
    }
    if (!Number.isFinite(config.maxExtensionFactor) || config.maxExtensionFactor < 1) {
        throw new InvalidParameterError(
            'maxExtensionFactor',
            `must be a finite number >= 1, got ${config.maxExtensionFactor}`
        );
    }
    if (!Number.isInteger(config.seed)) {
        throw new InvalidParameterError('seed', `must be an integer, got ${config.seed}`);
    }

    return config;
}
