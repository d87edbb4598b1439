import { describe, expect, it } from "vitest";
import { actionNamesFor, toSnakeCase } from "../action-names.js";

describe("actionNamesFor", () => {
  it("derives the call and stream action names", () => {
    expect(actionNamesFor("ExtractTasks")).toEqual({ call: "extract_tasks", stream: "extract_tasks_stream" });
  });

  it("handles acronyms and digits", () => {
    expect(toSnakeCase("HTTPRequest")).toBe("http_request");
    expect(toSnakeCase("AnalyzeTicket2")).toBe("analyze_ticket2");
    expect(toSnakeCase("Summarize")).toBe("summarize");
  });
});
