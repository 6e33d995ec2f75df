export type DashboardStyleErrorCode =
  | 'invalid_class_name'
  | 'stylesheet_compile'
  | 'markup_contract';

export class DashboardStyleError extends Error {
  readonly code: DashboardStyleErrorCode;

  constructor(code: DashboardStyleErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A block, element or modifier name that does not follow the naming convention. */
export class ClassNameError extends DashboardStyleError {
  readonly input: string;

  constructor(kind: 'block' | 'element' | 'modifier', input: string, reason: string) {
    super('invalid_class_name', `Invalid ${kind} name "${input}": ${reason}`);
    this.input = input;
  }
}

export class StylesheetCompileError extends DashboardStyleError {
  readonly selector?: string;
  readonly variable?: string;

  constructor(message: string, details: { selector?: string; variable?: string } = {}) {
    super('stylesheet_compile', message);
    this.selector = details.selector;
    this.variable = details.variable;
  }
}

export interface ContractViolation {
  kind: 'missing-block' | 'unreachable-element' | 'unknown-element' | 'unknown-modifier';
  block: string;
  className?: string;
  message: string;
}

export class MarkupContractError extends DashboardStyleError {
  readonly violations: ContractViolation[];

  constructor(block: string, violations: ContractViolation[]) {
    super(
      'markup_contract',
      `Markup for ${block} breaks its contract: ${violations.map((v) => v.message).join('; ')}`,
    );
    this.violations = violations;
  }
}
