/** Any ordered sequence of values. Rows are copied into an array once per pass. */
export type TableRow = Iterable<unknown>;

/**
 * Header row first, data rows after. Validating the same table again asks it for a
 * fresh iterator, so tables are expected to restart from the header on every call.
 */
export type Table = Iterable<TableRow>;
