export type BoundingBox = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type TextLine = Readonly<{
  text: string;
  box: BoundingBox;
  index: number;
}>;

export type Page = Readonly<{
  number: number;
  lines: readonly TextLine[];
  imageWidth: number;
  imageHeight: number;
}>;

export type Token = {
  text: string;
  start: number;
  end: number;
};

export type DiffOperation = "equal" | "delete" | "insert" | "replace";

export type RecordOperation = Exclude<DiffOperation, "equal">;

export type DiffSegment = Readonly<{
  operation: DiffOperation;
  textA: string | null;
  textB: string | null;
  startA: number;
  endA: number;
  startB: number;
  endB: number;
}>;

type RecordBase = {
  pageA: number | null;
  pageB: number | null;
};

export type InsertedRecord = Readonly<
  RecordBase & {
    kind: "inserted";
    operation: "insert";
    textA: null;
    textB: string;
    boxesA: readonly [];
    boxesB: readonly BoundingBox[];
  }
>;

export type DeletedRecord = Readonly<
  RecordBase & {
    kind: "deleted";
    operation: "delete";
    textA: string;
    textB: null;
    boxesA: readonly BoundingBox[];
    boxesB: readonly [];
  }
>;

// Paired text on both sides; operation is re-inferred from the word segments.
export type ModifiedRecord = Readonly<
  RecordBase & {
    kind: "modified";
    operation: RecordOperation;
    textA: string;
    textB: string;
    boxesA: readonly BoundingBox[];
    boxesB: readonly BoundingBox[];
    unifiedDiff: string;
    segments: readonly DiffSegment[];
  }
>;

export type DiffRecord = InsertedRecord | DeletedRecord | ModifiedRecord;

export type ComparisonReport = Readonly<{
  documentA: string;
  documentB: string;
  totalPagesA: number;
  totalPagesB: number;
  records: readonly DiffRecord[];
}>;

export type GroupingThresholds = Readonly<{
  maxYGap: number;
  maxXGap: number;
}>;

export type CompareOptions = {
  grouping?: GroupingThresholds;
};
