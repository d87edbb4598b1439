export interface ActionNames {
  /** Single-shot action, e.g. `extract_tasks` */
  readonly call: string;
  /** Streaming action, e.g. `extract_tasks_stream` */
  readonly stream: string;
}

/**
 * `ExtractTasks` -> `extract_tasks`, `HTTPRequest` -> `http_request`.
 */
export function toSnakeCase(name: string): string {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1_$2")
    .replace(/([a-z\d])([A-Z])/g, "$1_$2")
    .replace(/[-\s]+/g, "_")
    .toLowerCase();
}

/** Names of the action pair exposed for one imported function */
export function actionNamesFor(functionName: string): ActionNames {
  const call = toSnakeCase(functionName);
  return { call, stream: `${call}_stream` };
}
