// For the terms of use see COPYRIGHT.md


export {defaultRendering, Item, RingList} from "./util/RingList";
export type {Rendering, RingListOptions} from "./util/RingList";
export {booleanTraits, numberTraits, stringTraits, traits} from "./util/traits";
export type {ElementTraits} from "./util/traits";
export {EmptyListError, IndexOutOfBoundsError, NotFoundError, RingCorruptedError, RingListError} from "./util/errors";
export {checkRing} from "./util/ringInvariants";
export {Logger, logLevels} from "./Logger";
export type {LogLevel, LogSink} from "./Logger";
export {defaults, load} from "./config";
export type {Config, ConfigFile} from "./config";
