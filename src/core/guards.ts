/**
 * @module core/guards
 * @description Argument checks that raise InvalidParameterError naming the argument
 */

import { InvalidParameterError } from './errors';

export function requireFinite(name: string, value: number): number {
    if (!Number.isFinite(value)) {
        throw new InvalidParameterError(name, `must be a finite number, got ${value}`);
    }
    return value;
}

export function requirePositive(name: string, value: number): number {
    requireFinite(name, value);
    if (value <= 0) {
        throw new InvalidParameterError(name, `must be > 0, got ${value}`);
    }
    return value;
}

export function requireNonNegative(name: string, value: number): number {
    requireFinite(name, value);
    if (value < 0) {
        throw new InvalidParameterError(name, `must be >= 0, got ${value}`);
    }
    return value;
}

/**
 * Integer check with an inclusive lower bound (default 1)
 */
export function requireInteger(name: string, value: number, min = 1): number {
    if (!Number.isInteger(value) || value < min) {
        throw new InvalidParameterError(name, `must be an integer >= ${min}, got ${value}`);
    }
    return value;
}

/**
 * Inclusive range check
 */
export function requireInRange(name: string, value: number, min: number, max: number): number {
    requireFinite(name, value);
    if (value < min || value > max) {
        throw new InvalidParameterError(name, `must be within [${min}, ${max}], got ${value}`);
    }
    return value;
}
