import { NextResponse } from "next/server";
import { isValidationError } from "./errors";

export function errorResponse(err: unknown, context: string): NextResponse {
  if (isValidationError(err)) {
    return NextResponse.json({ ok: false, error: err.message, issues: err.issues }, { status: 400 });
  }
  console.error(`${context}:`, err);
  return NextResponse.json({ ok: false, error: String(err) }, { status: 500 });
}
