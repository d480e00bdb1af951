/**
 * Person records: parsing, serialization and age adjustment.
 *
 * @module record
 */

export {
	FIELD_COUNT,
	FIELD_DELIMITER,
	type LineOrigin,
	type PersonRecord,
	parseRecord,
	parseRecords,
	recordFromFields,
	recordToFields,
	serializeRecord,
	serializeRecords,
} from "./codec.js";
export {
	adjustAll,
	applyAdjustment,
	describeChange,
	type Notify,
} from "./transform.js";
