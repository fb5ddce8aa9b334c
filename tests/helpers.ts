import type { Logger } from '../src/logger';

export function silentLogger(): jest.Mocked<Logger> {
    return {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    };
}

export const HOUR = 60 * 60 * 1000;
