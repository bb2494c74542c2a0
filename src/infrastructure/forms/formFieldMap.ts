import { readFile } from "node:fs/promises";
import { type SubmissionField, submissionFields } from "../../core/stores/store.types";

export type FormFieldMap = Record<SubmissionField, string>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const emptyMap = (): FormFieldMap => ({
  store: "",
  orders: "",
  units: "",
  fulfilled: "",
  uph: "",
  inf: "",
  found: "",
  cancelled: "",
  lates: "",
  time_available: ""
});

export const parseFormFieldMap = (value: unknown, source = "form field map"): FormFieldMap => {
  if (!isRecord(value)) {
    throw new Error(`${source} must be a JSON object`);
  }

  const missing = submissionFields.filter((field) => {
    const key = value[field];
    return typeof key !== "string" || key.trim() === "";
  });
  if (missing.length > 0) {
    throw new Error(`${source} is missing form keys for: ${missing.join(", ")}`);
  }

  const map = emptyMap();
  for (const field of submissionFields) {
    map[field] = String(value[field]).trim();
  }
  return map;
};

export const loadFormFieldMap = async (filePath: string): Promise<FormFieldMap> => {
  const text = await readFile(filePath, "utf8");
  return parseFormFieldMap(JSON.parse(text), filePath);
};
