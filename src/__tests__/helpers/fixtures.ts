import { readFileSync } from "node:fs";
import path from "node:path";

const FIXTURE_DIR = path.join(__dirname, "..", "fixtures");

export function readFixture(name: string): string {
  return readFileSync(path.join(FIXTURE_DIR, name), "utf8");
}

export function readFixtureBuffer(name: string): Buffer {
  return readFileSync(path.join(FIXTURE_DIR, name));
}

export function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error("expected the action to throw");
}
