/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Field readers. A malformed value never throws: the reader returns the
  default and appends a diagnostic to the caller's issue list.
*/

import { diagnostic } from './diagnostics';
import type { Diagnostic } from './diagnostics';
import type { MarkupElement } from './types';

type Invalid = (raw: string) => Diagnostic;

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/** Enumerated value, matched case-insensitively. */
export function parseEnum<T extends string>(
  raw: string | undefined,
  values: readonly T[],
  issues: Diagnostic[],
  invalid: Invalid
): T | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (isOneOf(values, value)) return value;
  issues.push(invalid(raw));
  return undefined;
}

export function parseInteger(raw: string | undefined, issues: Diagnostic[], invalid: Invalid): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number.parseInt(raw.trim(), 10);
  if (!/^[+-]?\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    issues.push(invalid(raw));
    return undefined;
  }
  return value;
}

export function parseNumber(raw: string | undefined, issues: Diagnostic[], invalid: Invalid): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw.trim());
  if (!Number.isFinite(value)) {
    issues.push(invalid(raw));
    return undefined;
  }
  return value;
}

export function parseBoolean(
  raw: string | undefined,
  fallback: boolean,
  issues: Diagnostic[],
  invalid: Invalid
): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  if (value === 'true') return true;
  if (value === 'false') return false;
  issues.push(invalid(raw));
  return fallback;
}

/** First attribute present among `names`. */
export function attr(element: MarkupElement, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = element.attributes[name];
    if (value !== undefined) return value;
  }
  return undefined;
}

export function invalidAttribute(element: MarkupElement, name: string): Invalid {
  return (raw) => diagnostic('invalid_attribute', `${element.rawName}@${name}=${raw}`, element.startOffset);
}

/**
 * Attribute the variant cannot do without. Absent or blank values are
 * reported as `missing_attribute:<tag>@<attribute>`.
 */
export function requiredAttribute(element: MarkupElement, name: string, issues: Diagnostic[]): string | undefined {
  const value = element.attributes[name];
  if (value === undefined || value.trim() === '') {
    issues.push(diagnostic('missing_attribute', `${element.rawName}@${name}`, element.startOffset));
    return undefined;
  }
  return value;
}

export function enumAttribute<T extends string>(
  element: MarkupElement,
  name: string,
  values: readonly T[],
  issues: Diagnostic[]
): T | undefined {
  return parseEnum(element.attributes[name], values, issues, invalidAttribute(element, name));
}

export function integerAttribute(element: MarkupElement, name: string, issues: Diagnostic[]): number | undefined {
  return parseInteger(element.attributes[name], issues, invalidAttribute(element, name));
}

export function numberAttribute(element: MarkupElement, name: string, issues: Diagnostic[]): number | undefined {
  return parseNumber(element.attributes[name], issues, invalidAttribute(element, name));
}
