import { type CaveObject } from '../types/cave-object.js';
import { type Element, parseElement } from '../types/element.js';
import { type CaveData, isValidCaveSize } from '../classes/cave.js';
import { logWarning, withLoggerContext } from '../classes/logger.js';
import { parseIntegerToken, tokenize } from '../objects/codec.js';
import { parseObjectLine, serializeObject } from '../objects/registry.js';

/**
 * Text format of a cave file.
 *
 *   ; comment
 *   Name=Intro
 *   Size=40 22
 *   InitialFill=Dirt
 *   Rectangle 0 0 39 21 SteelWall
 *
 * Attribute lines are `Key=Value`; every other non-blank, non-comment line is
 * an object line. Problems are reported through the active logger with the
 * raw line, and the offending line is skipped.
 */

export interface CaveDefaults {
    width: number;
    height: number;
    initialFill: Element;
}

export const BUILTIN_CAVE_DEFAULTS: Readonly<CaveDefaults> = Object.freeze({
    width: 40,
    height: 22,
    initialFill: 'Dirt',
});

const ATTRIBUTE_LINE = /^([A-Za-z][A-Za-z0-9]*)=(.*)$/;

/**
 * Parses cave text. Never throws; see the active logger for skipped lines.
 *
 * @param name Cave name used when the text has no `Name=` line.
 */
export function parseCaveText(text: string, name: string, defaults: CaveDefaults = BUILTIN_CAVE_DEFAULTS): CaveData {
    const data: CaveData = {
        name,
        width: defaults.width,
        height: defaults.height,
        initialFill: defaults.initialFill,
        objects: [],
    };

    const lines = text.split(/\r?\n/);
    lines.forEach((raw, i) => {
        const line = raw.trim();
        if (line === '' || line.startsWith(';')) return;

        withLoggerContext(`line ${String(i + 1)}`, () => {
            const attribute = ATTRIBUTE_LINE.exec(line);
            if (attribute !== null) {
                applyAttribute(data, attribute[1], attribute[2].trim(), line);
                return;
            }

            const object: CaveObject | null = parseObjectLine(line);
            if (object === null) {
                logWarning(`Cannot parse object line, skipped: ${line}`);
                return;
            }
            data.objects.push(object);
        });
    });

    return data;
}

function applyAttribute(data: CaveData, key: string, value: string, line: string): void {
    switch (key) {
        case 'Name':
            if (value === '') {
                logWarning(`Empty cave name, ignored: ${line}`);
                return;
            }
            data.name = value;
            return;
        case 'Size': {
            const tokens = tokenize(value);
            const width = tokens.length === 2 ? parseIntegerToken(tokens[0]) : null;
            const height = tokens.length === 2 ? parseIntegerToken(tokens[1]) : null;
            if (width === null || height === null || !isValidCaveSize(width, height)) {
                logWarning(`Invalid cave size, ignored: ${line}`);
                return;
            }
            data.width = width;
            data.height = height;
            return;
        }
        case 'InitialFill': {
            const element = parseElement(value);
            if (element === null) {
                logWarning(`Unknown element, ignored: ${line}`);
                return;
            }
            data.initialFill = element;
            return;
        }
        default:
            logWarning(`Unknown attribute, ignored: ${line}`);
    }
}

/**
 * Canonical text of a cave: attributes first, then one line per object.
 * Ends with a newline.
 */
export function formatCaveText(data: CaveData): string {
    const lines = [
        `Name=${data.name}`,
        `Size=${String(data.width)} ${String(data.height)}`,
        `InitialFill=${data.initialFill}`,
        ...data.objects.map(serializeObject),
    ];
    return lines.join('\n') + '\n';
}
