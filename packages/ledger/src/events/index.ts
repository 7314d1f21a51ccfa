/**
 * Events module - Append-only transition log
 */

export {
	EventLog,
	type EventLogOptions,
	type LogListener,
} from "./event-log.js";
