import { ArkivError } from "../errors";
import type {
  Annotation,
  AnnotationValue,
  Annotations,
  NumericAnnotation,
  StringAnnotation,
} from "./types";

export function createAnnotation<T extends AnnotationValue>(
  key: string,
  value: T,
): Annotation<T> {
  if (typeof value === "number" && !(Number.isSafeInteger(value) && value >= 0)) {
    throw new ArkivError(
      `Integer annotation values must be non-negative, got: ${value}`,
    );
  }
  return { key, value };
}

export function splitAnnotations(
  annotations?: Annotations,
): [StringAnnotation[], NumericAnnotation[]] {
  const stringAnnotations: StringAnnotation[] = [];
  const numericAnnotations: NumericAnnotation[] = [];
  if (!annotations) {
    return [stringAnnotations, numericAnnotations];
  }

  for (const [key, value] of Object.entries(annotations)) {
    if (typeof value === "string") {
      stringAnnotations.push(createAnnotation(key, value));
    } else {
      numericAnnotations.push(createAnnotation(key, value));
    }
  }
  return [stringAnnotations, numericAnnotations];
}

export function mergeAnnotations(
  stringAnnotations: readonly StringAnnotation[],
  numericAnnotations: readonly NumericAnnotation[],
): Annotations {
  const merged: Annotations = {};
  for (const { key, value } of stringAnnotations) {
    merged[key] = value;
  }
  for (const { key, value } of numericAnnotations) {
    merged[key] = value;
  }
  return merged;
}
