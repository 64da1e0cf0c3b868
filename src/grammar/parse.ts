/**
 * Sentence template parser.
 *
 * Syntax:
 * - plain text is kept verbatim, whitespace included
 * - (a|b) chooses one alternative, (a b) groups
 * - [x] is optional
 * - {name} references a list, <name> references an expansion rule
 * - \ takes the next character literally
 */

import { TEMPLATE_CHARS } from "../config/constants.js";
import { TemplateParseError } from "./errors.js";
import {
  alternative,
  group,
  listRef,
  ruleRef,
  text,
  type Alternative,
  type Expression,
  type Group,
} from "./expression.js";

type Closer = ")" | "]";

export function isTemplate(value: string): boolean {
  return [...TEMPLATE_CHARS].some((c) => value.includes(c));
}

class TemplateParser {
  private pos = 0;

  constructor(private readonly template: string) {}

  parse(): Group {
    const root = this.parseSequence(undefined);
    return root.type === "group" ? root : group(root);
  }

  private fail(message: string): never {
    throw new TemplateParseError(message, this.template, this.pos);
  }

  private parseSequence(closer: Closer | undefined): Group | Alternative {
    const branches: Group[] = [];
    let items: Expression[] = [];
    let literal = "";

    const flush = (): void => {
      if (literal) {
        items.push(text(literal));
        literal = "";
      }
    };

    const finish = (): Group | Alternative => {
      flush();
      if (branches.length === 0) return group(...items);
      branches.push(group(...items));
      return alternative(...branches);
    };

    while (this.pos < this.template.length) {
      const ch = this.template.charAt(this.pos);
      switch (ch) {
        case "\\": {
          const next = this.template.charAt(this.pos + 1);
          literal += next || ch;
          this.pos += next ? 2 : 1;
          break;
        }
        case "(": {
          flush();
          this.pos++;
          items.push(this.parseSequence(")"));
          break;
        }
        case "[": {
          flush();
          this.pos++;
          items.push(alternative(this.parseSequence("]"), text("")));
          break;
        }
        case "{": {
          flush();
          items.push(listRef(this.readName("}")));
          break;
        }
        case "<": {
          flush();
          items.push(ruleRef(this.readName(">")));
          break;
        }
        case "|": {
          flush();
          branches.push(group(...items));
          items = [];
          this.pos++;
          break;
        }
        case ")":
        case "]": {
          if (ch !== closer) this.fail(`Unexpected "${ch}"`);
          this.pos++;
          return finish();
        }
        case "}":
        case ">": {
          this.fail(`Unexpected "${ch}"`);
        }
        default: {
          literal += ch;
          this.pos++;
        }
      }
    }

    if (closer) this.fail(`Missing "${closer}"`);
    return finish();
  }

  private readName(closer: "}" | ">"): string {
    const end = this.template.indexOf(closer, this.pos + 1);
    if (end < 0) this.fail(`Missing "${closer}"`);
    const name = this.template.slice(this.pos + 1, end).trim();
    if (!name) this.fail("Empty reference name");
    this.pos = end + 1;
    return name;
  }
}

export function parseSentence(template: string): Group {
  return new TemplateParser(template).parse();
}
