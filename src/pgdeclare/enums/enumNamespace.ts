// enums/enumNamespace.ts

import {
  ConfigurationError,
  DuplicateLabelError,
  DuplicateValueError,
} from "../errors.js";

export interface EnumMemberInput<L extends string = string> {
  label: L;
  value: string;
  /** Alternate text written to storage in place of `value`. */
  mappingValue?: string;
}

export interface EnumMember<L extends string = string> {
  readonly kind: "enum-member";
  readonly namespaceId: symbol;
  readonly namespace: string;
  readonly label: L;
  readonly value: string;
  readonly mappingValue?: string | undefined;
  /** What storage holds for this member: `mappingValue ?? value`. */
  readonly storedValue: string;
}

export interface EnumNamespaceOptions {
  schema?: string;
}

export function isEnumMember(candidate: unknown): candidate is EnumMember {
  return (
    typeof candidate === "object" &&
    candidate !== null &&
    "kind" in candidate &&
    candidate.kind === "enum-member" &&
    "namespaceId" in candidate &&
    typeof candidate.namespaceId === "symbol"
  );
}

/** Members are equal only when both the namespace and the value match. */
export function enumMemberEquals(a: EnumMember, b: EnumMember): boolean {
  return a.namespaceId === b.namespaceId && a.value === b.value;
}

/* ===================================================== */
/* ================= ENUM NAMESPACE ==================== */
/* ===================================================== */

export class EnumNamespace<L extends string = string> {
  readonly id: symbol;
  readonly name: string;
  readonly schema: string;

  private readonly members: readonly EnumMember<L>[];
  private readonly byLabel = new Map<string, EnumMember<L>>();
  private readonly byValueMap = new Map<string, EnumMember<L>>();
  private readonly byStored = new Map<string, EnumMember<L>>();

  constructor(
    name: string,
    members: readonly EnumMemberInput<L>[],
    options: EnumNamespaceOptions = {}
  ) {
    this.id = Symbol(name);
    this.name = name;
    this.schema = options.schema ?? "public";

    const built: EnumMember<L>[] = [];

    // label first, then value, then stored text: the first duplicate in
    // declaration order decides which error is raised
    for (const input of members) {
      if (this.byLabel.has(input.label)) {
        throw new DuplicateLabelError(name, input.label);
      }
      if (this.byValueMap.has(input.value)) {
        throw new DuplicateValueError(name, input.value);
      }

      const storedValue = input.mappingValue ?? input.value;
      if (this.byStored.has(storedValue)) {
        throw new DuplicateValueError(name, storedValue);
      }

      const member: EnumMember<L> = Object.freeze({
        kind: "enum-member",
        namespaceId: this.id,
        namespace: name,
        label: input.label,
        value: input.value,
        mappingValue: input.mappingValue,
        storedValue,
      });

      this.byLabel.set(member.label, member);
      this.byValueMap.set(member.value, member);
      this.byStored.set(storedValue, member);
      built.push(member);
    }

    this.members = Object.freeze(built);
    Object.freeze(this);
  }

  get qualifiedName(): string {
    return `${this.schema}.${this.name}`;
  }

  member(label: L): EnumMember<L> {
    const found = this.byLabel.get(label);
    if (!found) {
      throw new ConfigurationError(`Enum ${this.name} has no member "${label}"`, {
        namespace: this.name,
        label,
      });
    }
    return found;
  }

  /** True iff the candidate was declared in this namespace. */
  contains(candidate: unknown): candidate is EnumMember<L> {
    return (
      isEnumMember(candidate) &&
      candidate.namespaceId === this.id &&
      this.byValueMap.has(candidate.value)
    );
  }

  byValue(value: string): EnumMember<L> | undefined {
    return this.byValueMap.get(value);
  }

  /** Looks a stored text up; a mapping value, when declared, is authoritative. */
  fromStored(text: string): EnumMember<L> | undefined {
    return this.byStored.get(text);
  }

  allMembers(): readonly EnumMember<L>[] {
    return this.members;
  }

  storedValues(): string[] {
    return this.members.map((m) => m.storedValue);
  }
}
