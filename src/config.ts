// For the terms of use see COPYRIGHT.md


import {Validator} from "jsonschema";
import type {Schema} from "jsonschema";
import {join} from "path";
import {logLevels} from "./Logger";
import type {LogLevel} from "./Logger";
import {defaultRendering} from "./util/RingList";
import type {Rendering} from "./util/RingList";
import {fs} from "./util/promisified";

const {readdir, readFile, stat} = fs;


export interface Config {
    logging: {
        level: LogLevel;
    };

    rendering: Rendering;
}

export interface ConfigFile {
    logging?: {
        level?: LogLevel;
    };

    rendering?: Partial<Rendering>;
}

export const defaults: Config = {
    logging: {level: "warning"},
    rendering: Object.assign({}, defaultRendering)
};

let configValidator = new Validator();

let schema = object(
    {
        logging: object({level: {enum: logLevels}}),
        rendering: object({
            separator: {type: "string"},
            terminator: {type: "string"}
        })
    },
    {title: "Ring list config"}
);

let jsonFile = /.\.json$/i;

/**
 * Reads, validates and merges the given config files over the defaults.
 * Directories are searched recursively for *.json files, in name order.
 */
export async function load(paths: string[]): Promise<Config> {
    let files: string[] = [];

    for (let path of paths) {
        await collectFiles(path, files, 0);
    }

    let config: Config = {
        logging: Object.assign({}, defaults.logging),
        rendering: Object.assign({}, defaults.rendering)
    };

    for (let file of files) {
        merge(config, parse(file, await readFile(file)));
    }

    return config;
}

export function parse(path: string, content: string): ConfigFile {
    let parsed: unknown;

    try {
        parsed = JSON.parse(content);
    } catch (e) {
        throw new Error("Invalid JSON in " + JSON.stringify(path));
    }

    validate(path, parsed);

    return parsed;
}

function validate(path: string, parsed: unknown): asserts parsed is ConfigFile {
    let errors = configValidator.validate(parsed, schema).errors;

    if (errors.length) {
        throw new Error("Invalid config in " + JSON.stringify(path) + ": " + errors[0].stack);
    }
}

function merge(config: Config, file: ConfigFile): void {
    if (typeof file.logging !== "undefined" && typeof file.logging.level !== "undefined") {
        config.logging.level = file.logging.level;
    }

    if (typeof file.rendering !== "undefined") {
        let {separator, terminator} = file.rendering;

        if (typeof separator !== "undefined") {
            config.rendering.separator = separator;
        }

        if (typeof terminator !== "undefined") {
            config.rendering.terminator = terminator;
        }
    }
}

function object(properties: { [name: string]: Schema; }, params: Schema = {}): Schema {
    return Object.assign(
        {
            type: "object",
            additionalProperties: false,
            properties: properties
        },
        params
    );
}

async function collectFiles(path: string, dest: string[], level: number): Promise<void> {
    let stats = await stat(path);

    if (stats.isDirectory()) {
        for (let subPath of (await readdir(path)).sort()) {
            await collectFiles(join(path, subPath), dest, level + 1);
        }
    } else if (level === 0 || (stats.isFile() && jsonFile.exec(path) !== null)) {
        dest.push(path);
    }
}
