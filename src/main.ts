#!/usr/bin/env node
// For the terms of use see COPYRIGHT.md


import {load as config} from "./config";
import {demo} from "./demo";
import {Logger} from "./Logger";


let logger = new Logger("critical");

(async (): Promise<void> => {
    let loaded = await config(process.argv.slice(2));

    logger = new Logger(loaded.logging.level);
    demo(loaded, logger);
})().catch(ultimaRatio);

function ultimaRatio(reason: Error): void {
    process.exitCode = 1;
    logger.critical(reason);
}
