export class TemplateParseError extends Error {
  constructor(
    message: string,
    readonly template: string,
    readonly position: number
  ) {
    super(`${message} at position ${position} in "${template}"`);
    this.name = "TemplateParseError";
  }
}

export class MissingListError extends Error {
  constructor(readonly listName: string) {
    super(`Missing slot list {${listName}}`);
    this.name = "MissingListError";
  }
}

export class MissingRuleError extends Error {
  constructor(readonly ruleName: string) {
    super(`Missing expansion rule <${ruleName}>`);
    this.name = "MissingRuleError";
  }
}
