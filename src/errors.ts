export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

export type GraphErrorKind =
  | "DuplicateName"
  | "UnknownDependency"
  | "UnknownService"
  | "CycleDetected"
  | "MissingEnv";

/** Raised while building the service graph; nothing has been started when it is thrown. */
export class GraphError extends Error {
  readonly kind: GraphErrorKind;
  readonly services: string[];

  constructor(kind: GraphErrorKind, message: string, services: string[] = []) {
    super(message);
    this.name = "GraphError";
    this.kind = kind;
    this.services = services;
  }
}
