export class ConfigError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.variable = variable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
