// Decodes upstream JSON bodies into flat domain records; shape mismatches become UpstreamDecodeError.
import type { RawCommit, RepositorySummary } from "../../domain/history-types.js";
import { UpstreamDecodeError } from "../../domain/upstream-errors.js";

export const SHORT_SHA_LENGTH = 7;
const SHA_PATTERN = /^[0-9a-f]+$/i;
const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonArray(url: string, body: string): unknown[] {
  let parsed: unknown;

  try {
    parsed = JSON.parse(body);
  } catch (error) {
    const cause = error instanceof Error ? error.message : String(error);
    throw new UpstreamDecodeError(url, `body is not valid JSON (${cause})`);
  }

  if (!Array.isArray(parsed)) {
    throw new UpstreamDecodeError(url, "expected a JSON array");
  }

  return parsed;
}

function requireRecord(url: string, value: unknown, field: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new UpstreamDecodeError(url, `\`${field}\` must be an object`);
  }

  return value;
}

function requireString(url: string, value: unknown, field: string): string {
  if (typeof value !== "string") {
    throw new UpstreamDecodeError(url, `\`${field}\` must be a string`);
  }

  return value;
}

function requireNonEmptyString(url: string, value: unknown, field: string): string {
  const text = requireString(url, value, field);

  if (text.trim().length === 0) {
    throw new UpstreamDecodeError(url, `\`${field}\` must be a non-empty string`);
  }

  return text;
}

function normalizeNullableString(url: string, value: unknown, field: string): string {
  if (value === undefined || value === null) {
    return "";
  }

  return requireString(url, value, field);
}

function requireSha(url: string, value: unknown, field: string): string {
  const sha = requireString(url, value, field);

  if (sha.length < SHORT_SHA_LENGTH || !SHA_PATTERN.test(sha)) {
    throw new UpstreamDecodeError(
      url,
      `\`${field}\` must be a hex string of at least ${SHORT_SHA_LENGTH} characters`,
    );
  }

  return sha;
}

function requireTimestamp(url: string, value: unknown, field: string): string {
  const timestamp = requireNonEmptyString(url, value, field);

  if (!RFC3339_PATTERN.test(timestamp) || Number.isNaN(Date.parse(timestamp))) {
    throw new UpstreamDecodeError(url, `\`${field}\` must be an RFC 3339 timestamp`);
  }

  return timestamp;
}

function parseRepository(url: string, value: unknown, index: number): RepositorySummary {
  const record = requireRecord(url, value, `[${index}]`);

  return {
    name: requireNonEmptyString(url, record.name, `[${index}].name`),
    fullName: requireNonEmptyString(url, record.full_name, `[${index}].full_name`),
    description: normalizeNullableString(url, record.description, `[${index}].description`),
    htmlUrl: requireString(url, record.html_url, `[${index}].html_url`),
  };
}

function parseCommit(url: string, value: unknown, index: number): RawCommit {
  const record = requireRecord(url, value, `[${index}]`);
  const commit = requireRecord(url, record.commit, `[${index}].commit`);
  const author = requireRecord(url, commit.author, `[${index}].commit.author`);

  return {
    sha: requireSha(url, record.sha, `[${index}].sha`),
    message: normalizeNullableString(url, commit.message, `[${index}].commit.message`),
    authorName: normalizeNullableString(url, author.name, `[${index}].commit.author.name`),
    authorEmail: normalizeNullableString(url, author.email, `[${index}].commit.author.email`),
    authorDate: requireTimestamp(url, author.date, `[${index}].commit.author.date`),
    htmlUrl: requireString(url, record.html_url, `[${index}].html_url`),
  };
}

export function decodeRepositoryList(url: string, body: string): RepositorySummary[] {
  return parseJsonArray(url, body).map((value, index) => parseRepository(url, value, index));
}

export function decodeCommitList(url: string, body: string): RawCommit[] {
  return parseJsonArray(url, body).map((value, index) => parseCommit(url, value, index));
}
