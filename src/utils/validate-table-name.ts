const TABLE_NAME_REGEX = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function validateTableName(tableName: string): void {
  if (!TABLE_NAME_REGEX.test(tableName)) {
    throw new Error(
      `Invalid table name "${tableName}". Only alphanumeric characters and underscores are allowed.`,
    );
  }
}

export function runsTableName(eventsTable: string): string {
  const runsTable = `${eventsTable}_runs`;
  validateTableName(runsTable);
  return runsTable;
}
