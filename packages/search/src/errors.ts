export class DimensionMismatchError extends Error {
  readonly namespace: string;
  readonly expected: number;
  readonly actual: number;

  constructor(namespace: string, expected: number, actual: number) {
    super(
      `Namespace "${namespace}" holds ${expected}-dimensional vectors, got ${actual}`
    );
    this.name = "DimensionMismatchError";
    this.namespace = namespace;
    this.expected = expected;
    this.actual = actual;
  }
}
