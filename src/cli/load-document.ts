import { readFileSync } from "node:fs";
import path from "node:path";
import { parseLinkageDocument, type LinkageDocument } from "../LinkageDocument";
import { CliError } from "./cli-error";

export function loadLinkageDocument(file: string): LinkageDocument {
  const resolved = path.resolve(file);
  let text: string;
  try {
    text = readFileSync(resolved, "utf8");
  } catch (err) {
    throw new CliError(`Cannot read linkage file ${resolved}: ${err instanceof Error ? err.message : String(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new CliError(`Linkage file ${resolved} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseLinkageDocument(json);
}
