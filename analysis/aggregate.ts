import type {
  Aggregation,
  ClassifiedRow,
  ColumnMap,
  CourseRow,
  PrefixSummary,
  UniqueCourse,
} from "./analyzer.types.js";

function courseKey(row: CourseRow, cols: ColumnMap) {
  return `${row[cols.prefix] ?? ""}\u0000${row[cols.number] ?? ""}`;
}

// Empty values sort last; everything else by code unit so runs are locale-independent
export function compareValues(a: string, b: string): number {
  if (a === b) return 0;
  if (!a) return 1;
  if (!b) return -1;
  return a < b ? -1 : 1;
}

export function compareCourses(a: CourseRow, b: CourseRow, cols: ColumnMap): number {
  return compareValues(a[cols.prefix] ?? "", b[cols.prefix] ?? "")
    || compareValues(a[cols.number] ?? "", b[cols.number] ?? "");
}

/** Stable (prefix, number) sort; rows with equal keys keep their input order. */
export function sortByCourse<T>(items: T[], cols: ColumnMap, rowOf: (item: T) => CourseRow): T[] {
  return [...items].sort((a, b) => compareCourses(rowOf(a), rowOf(b), cols));
}

/** One entry per (prefix, number): the first after sorting. */
export function dedupeByCourse<T>(items: T[], cols: ColumnMap, rowOf: (item: T) => CourseRow): T[] {
  const seen = new Set<string>();
  return sortByCourse(items, cols, rowOf).filter(item => {
    const key = courseKey(rowOf(item), cols);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

/**
 * Collapse duplicate rows into unique courses. The canonical row is the
 * first after sorting; the AI flag is OR'd over the whole group.
 */
export function uniqueCourses(classified: ClassifiedRow[], cols: ColumnMap): UniqueCourse[] {
  const groups = new Map<string, UniqueCourse>();
  for (const { row, result } of sortByCourse(classified, cols, c => c.row)) {
    const key = courseKey(row, cols);
    const existing = groups.get(key);
    if (existing) {
      existing.is_ai_related = existing.is_ai_related || result.is_ai_related;
    } else {
      groups.set(key, { row, is_ai_related: result.is_ai_related });
    }
  }
  return Array.from(groups.values());
}

export function prefixSummary(courses: UniqueCourse[], cols: ColumnMap): PrefixSummary[] {
  const byPrefix = new Map<string, PrefixSummary>();
  for (const course of courses) {
    const prefix = course.row[cols.prefix] ?? "";
    let entry = byPrefix.get(prefix);
    if (!entry) {
      entry = { prefix, total_courses: 0, ai_related_courses: 0 };
      byPrefix.set(prefix, entry);
    }
    entry.total_courses += 1;
    if (course.is_ai_related) entry.ai_related_courses += 1;
  }
  return Array.from(byPrefix.values()).sort((a, b) => compareValues(a.prefix, b.prefix));
}

export function aggregate(classified: ClassifiedRow[], cols: ColumnMap): Aggregation {
  const courses = uniqueCourses(classified, cols);
  return {
    uniqueCourses: courses,
    aiSubset: courses.filter(c => c.is_ai_related),
    prefixSummary: prefixSummary(courses, cols),
    globalSummary: { metric: "total_unique_courses", value: courses.length },
  };
}
