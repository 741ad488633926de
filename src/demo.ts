// For the terms of use see COPYRIGHT.md


import type {Config} from "./config";
import {Logger} from "./Logger";
import {RingListError} from "./util/errors";
import {checkRing} from "./util/ringInvariants";
import {RingList} from "./util/RingList";
import {numberTraits} from "./util/traits";


/**
 * Walks a list of numbers through every operation, logging each result.
 */
export function demo(config: Config, logger: Logger): RingList<number> {
    let list = RingList.newList(numberTraits, {logger: logger, rendering: config.rendering});

    for (let i = 0; i < 5; ++i) {
        list.add(i);
    }

    checkRing(list);
    logger.info(list.render().trimEnd());

    for (let value of [0, 3, 22]) {
        let index = list.indexOf(value);

        logger.info("indexOf(" + value + ") = " + (index === null ? "none" : index));
    }

    try {
        list.removeIndex(666);
    } catch (e) {
        if (!(e instanceof RingListError)) {
            throw e;
        }

        logger.warning(e);
    }

    logger.info("removeIndex(3) = " + list.removeIndex(3));
    checkRing(list);
    logger.info(list.render().trimEnd());

    while (!list.isEmpty()) {
        logger.info("removeIndex(0) = " + list.removeIndex(0));
        checkRing(list);
    }

    logger.info(list.render().trimEnd());

    return list;
}
