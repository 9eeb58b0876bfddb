export class CancelledError extends Error {
  constructor(message = "Reassembly cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class PlanningError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanningError";
  }
}
