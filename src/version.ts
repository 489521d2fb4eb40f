const VERSION = "0.1.0";

export function getVersion(): string {
  return VERSION;
}
