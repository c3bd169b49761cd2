export class ChangeDetectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChangeDetectorError";
    Object.setPrototypeOf(this, ChangeDetectorError.prototype);
  }
}
