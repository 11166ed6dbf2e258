import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const ajv = new Ajv({ allErrors: true, strict: false });
const schemas = new Map<string, SchemaObject>();

function schemaPath(fileName: string): string {
  // Try multiple possible locations: repo checkout, dist build, cwd
  const possiblePaths = [
    path.resolve(__dirname, "../../docs/schemas", fileName),
    path.resolve(__dirname, "../../../docs/schemas", fileName),
    path.resolve(process.cwd(), "docs/schemas", fileName),
  ];

  const found = possiblePaths.find(p => fs.existsSync(p));
  if (!found) {
    throw new Error(`Schema ${fileName} not found. Tried: ${possiblePaths.join(", ")}`);
  }
  return found;
}

export function loadValidator<T>(fileName: string): ValidateFunction<T> {
  // Ajv caches compiled validators per schema object, so reuse the parsed one
  const cached = schemas.get(fileName);
  if (cached) {
    return ajv.compile<T>(cached);
  }
  const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath(fileName), "utf-8"));
  schemas.set(fileName, schema);
  return ajv.compile<T>(schema);
}

export function describeErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map(e => `${e.instancePath || "(root)"} ${e.message ?? "is invalid"}`);
}
