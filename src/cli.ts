import { Command } from "commander";
import { pathToFileURL } from "url";
import { type JsonValue, describeValue, isJsonValue } from "./codec";
import type { Column, ColumnValue } from "./column";
import { CsvwError } from "./errors";
import { type LogSink, createComponentLogger } from "./logger";
import type { Table } from "./table";
import { TableGroup } from "./tableGroup";

const log = createComponentLogger("cli");

export interface CliIo {
	write(line: string): void;
	fail(exitCode: number): void;
}

const processIo: CliIo = {
	write: (line) => console.log(line),
	fail: (exitCode) => {
		process.exitCode = exitCode;
	},
};

function cellToJson(value: ColumnValue, column: Column | undefined): JsonValue {
	if (value === null) {
		return null;
	}
	if (Array.isArray(value)) {
		return value.map((item) => cellToJson(item, column));
	}
	const datatype = column?.inherit("datatype");
	if (!datatype) {
		return describeValue(value);
	}
	if (datatype.base === "json" && isJsonValue(value)) {
		return value;
	}
	return datatype.formatted(value);
}

function selectTables(group: TableGroup, url: string | undefined): Table[] {
	if (url === undefined) {
		return group.tables.filter((table) => !table.suppressOutput);
	}
	const table = group.tableDict.get(url);
	if (!table) {
		throw new CsvwError(`No table ${url}; known tables: ${[...group.tableDict.keys()].join(", ")}`);
	}
	return [table];
}

export function createProgram(io: CliIo = processIo): Command {
	const program = new Command();

	program
		.name("csvw")
		.description("Read and validate delimited text described by CSVW table group metadata")
		.version("0.1.0");

	program
		.command("validate")
		.description("Check every row, primary key and foreign key of a table group")
		.argument("<metadata>", "Table group metadata file")
		.action((metadata: string) => {
			// Tables are read again by the key checks; each violation counts once.
			const reported = new Set<string>();
			const sink: LogSink = {
				warn(message) {
					if (!reported.has(message)) {
						reported.add(message);
						log.warn(message);
					}
				},
			};
			try {
				const group = TableGroup.fromFile(metadata);
				for (const table of group.tables) {
					const rows = [...table.iterRowsWithMetadata({ log: sink })].length;
					log.info(`${table.url}: ${rows} valid row(s)`);
					table.checkPrimaryKey(sink);
				}
				group.checkReferentialIntegrity(sink);
			} catch (e) {
				if (!(e instanceof CsvwError)) {
					throw e;
				}
				log.error(e.message);
				io.write(`${metadata}: ${e.message}`);
				io.fail(2);
				return;
			}
			if (reported.size > 0) {
				io.write(`${metadata}: ${reported.size} violation(s)`);
				io.fail(1);
			} else {
				io.write(`${metadata}: valid`);
			}
		});

	program
		.command("rows")
		.description("Print decoded rows as JSON lines")
		.argument("<metadata>", "Table group metadata file")
		.option("-t, --table <url>", "Only this table, by url as written in the metadata")
		.action((metadata: string, options: { table?: string }) => {
			const group = TableGroup.fromFile(metadata);
			for (const table of selectTables(group, options.table)) {
				const columns = table.tableSchema.columnDict;
				for (const row of table.iterRows()) {
					const record: Record<string, JsonValue> = {};
					for (const [key, value] of Object.entries(row)) {
						record[key] = cellToJson(value, columns.get(key));
					}
					io.write(JSON.stringify(record));
				}
			}
		});

	return program;
}

const invokedAs = process.argv[1];
if (invokedAs && import.meta.url === pathToFileURL(invokedAs).href) {
	createProgram().parse();
}
