/**
 * Helpers for reading YAML configuration documents into typed structures.
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../errors';

export type ConfigRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is ConfigRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/** Parse YAML text, turning syntax errors into ConfigError */
export function parseYamlDocument(text: string, source?: string): unknown {
    try {
        return parseYaml(text);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Invalid YAML: ${reason}`, source);
    }
}

/** Read a UTF-8 text file, turning fs errors into ConfigError */
export function readConfigFile(path: string): string {
    try {
        return readFileSync(path, 'utf-8');
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`Cannot read configuration file: ${reason}`, path);
    }
}

/** Read and parse a YAML file */
export function loadYamlFile(path: string): unknown {
    return parseYamlDocument(readConfigFile(path), path);
}

/** Resolve a data file that ships next to a module (see import.meta.url) */
export function resolveDataFile(moduleUrl: string, relativePath: string): string {
    return fileURLToPath(new URL(relativePath, moduleUrl));
}
