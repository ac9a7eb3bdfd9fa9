/**
 * @almanac/core -- the component tree.
 *
 * Components live in a ComponentArena owned by the parse result. A
 * component points at its parent by arena id rather than holding it, and
 * owns its children and properties by containment. After parsing the
 * tree is never modified; the only state that changes is each
 * property's memoized typed value.
 */

import { AlmanacError, MissingPropertyError, MissingRequiredPropertyError, PropertyConversionError } from "./errors";
import type { Duration } from "./duration";
import type { Property } from "./property";
import type { TimeValue } from "./time";
import { isTimeValue, type PropertyValue } from "./values";

// ---------------------------------------------------------------------------
// Component kinds
// ---------------------------------------------------------------------------

export type ComponentKind =
  | { readonly tag: "calendar" }
  | { readonly tag: "event" }
  | { readonly tag: "todo" }
  | { readonly tag: "journal" }
  | { readonly tag: "free-busy" }
  | { readonly tag: "timezone" }
  | { readonly tag: "timezone-rule"; readonly rule: "STANDARD" | "DAYLIGHT" }
  | { readonly tag: "alarm" }
  | { readonly tag: "unrecognized"; readonly name: string };

export type ComponentTag = ComponentKind["tag"];

export function componentKindFor(name: string): ComponentKind {
  const upper = name.trim().toUpperCase();
  switch (upper) {
    case "VCALENDAR":
      return { tag: "calendar" };
    case "VEVENT":
      return { tag: "event" };
    case "VTODO":
      return { tag: "todo" };
    case "VJOURNAL":
      return { tag: "journal" };
    case "VFREEBUSY":
      return { tag: "free-busy" };
    case "VTIMEZONE":
      return { tag: "timezone" };
    case "STANDARD":
    case "DAYLIGHT":
      return { tag: "timezone-rule", rule: upper === "STANDARD" ? "STANDARD" : "DAYLIGHT" };
    case "VALARM":
      return { tag: "alarm" };
    default:
      return { tag: "unrecognized", name: upper };
  }
}

export function componentName(kind: ComponentKind): string {
  switch (kind.tag) {
    case "calendar":
      return "VCALENDAR";
    case "event":
      return "VEVENT";
    case "todo":
      return "VTODO";
    case "journal":
      return "VJOURNAL";
    case "free-busy":
      return "VFREEBUSY";
    case "timezone":
      return "VTIMEZONE";
    case "timezone-rule":
      return kind.rule;
    case "alarm":
      return "VALARM";
    case "unrecognized":
      return kind.name;
  }
}

// ---------------------------------------------------------------------------
// Arena
// ---------------------------------------------------------------------------

export class ComponentArena {
  private readonly nodes: Component[] = [];

  /** Create a component; with a parent it is appended to the parent's children. */
  create(kind: ComponentKind, parent: Component | null = null): Component {
    if (parent && parent.arena !== this) {
      throw new AlmanacError("parent belongs to a different arena");
    }
    const component = new Component(this, this.nodes.length, kind, parent ? parent.id : null);
    this.nodes.push(component);
    parent?.attachChild(component.id);
    return component;
  }

  get(id: number): Component | undefined {
    return this.nodes[id];
  }

  get size(): number {
    return this.nodes.length;
  }

  /** Every component in creation (document) order. */
  all(): readonly Component[] {
    return this.nodes;
  }
}

// ---------------------------------------------------------------------------
// Component
// ---------------------------------------------------------------------------

export class Component {
  private readonly childIds: number[] = [];
  private readonly props: Property[] = [];

  constructor(
    readonly arena: ComponentArena,
    readonly id: number,
    readonly kind: ComponentKind,
    private readonly parentId: number | null,
  ) {}

  get tag(): ComponentTag {
    return this.kind.tag;
  }

  /** The component name as written (VEVENT, X-CUSTOM, ...). */
  get name(): string {
    return componentName(this.kind);
  }

  get parent(): Component | null {
    return this.parentId === null ? null : (this.arena.get(this.parentId) ?? null);
  }

  get children(): Component[] {
    const children: Component[] = [];
    for (const id of this.childIds) {
      const child = this.arena.get(id);
      if (child) children.push(child);
    }
    return children;
  }

  get properties(): readonly Property[] {
    return this.props;
  }

  /** @internal used by the tree builder */
  attachChild(id: number): void {
    this.childIds.push(id);
  }

  /** @internal used by the tree builder */
  appendProperty(property: Property): void {
    this.props.push(property);
  }

  // -------------------------------------------------------------------------
  // Traversal
  // -------------------------------------------------------------------------

  /** All properties with this name (case-insensitive), in document order. */
  propertiesNamed(name: string): Property[] {
    const upper = name.toUpperCase();
    return this.props.filter((p) => p.name === upper);
  }

  property(name: string, index = 0): Property | undefined {
    return this.propertiesNamed(name)[index];
  }

  hasProperty(name: string): boolean {
    const upper = name.toUpperCase();
    return this.props.some((p) => p.name === upper);
  }

  childrenOfType(tag: ComponentTag): Component[] {
    return this.children.filter((c) => c.tag === tag);
  }

  *ancestors(): Generator<Component> {
    let current = this.parent;
    while (current) {
      yield current;
      current = current.parent;
    }
  }

  /** Depth-first, pre-order, excluding this component. */
  *descendants(): Generator<Component> {
    for (const child of this.children) {
      yield child;
      yield* child.descendants();
    }
  }

  // -------------------------------------------------------------------------
  // Typed access
  // -------------------------------------------------------------------------

  /**
   * Typed value of the index-th property named `name`, converted on
   * first access and cached on the property.
   *
   * @throws MissingPropertyError when there is no such property
   * @throws PropertyConversionError when the raw value does not convert
   */
  getTyped(name: string, index = 0): PropertyValue {
    const property = this.property(name, index);
    if (!property) throw new MissingPropertyError(this.name, name.toUpperCase(), index);
    return property.typed();
  }

  /** Raw-value text of a property after TEXT unescaping, or undefined. */
  text(name: string): string | undefined {
    const property = this.property(name);
    if (!property) return undefined;
    const value = property.typed();
    return value.kind === "text" ? value.value : property.raw;
  }

  get uid(): string | undefined {
    return this.text("UID");
  }

  get summary(): string | undefined {
    return this.text("SUMMARY");
  }

  get status(): string | undefined {
    return this.text("STATUS")?.toUpperCase();
  }

  private timeValue(name: string): TimeValue | undefined {
    const property = this.property(name);
    if (!property) return undefined;
    const value = property.typed();
    if (!isTimeValue(value)) {
      throw new PropertyConversionError(property.name, property.raw, "expected a DATE or DATE-TIME");
    }
    return value;
  }

  start(): TimeValue | undefined {
    return this.timeValue("DTSTART");
  }

  /** DTEND, or DUE for to-dos. */
  end(): TimeValue | undefined {
    return this.timeValue(this.tag === "todo" ? "DUE" : "DTEND");
  }

  recurrenceId(): TimeValue | undefined {
    return this.timeValue("RECURRENCE-ID");
  }

  stamp(): TimeValue | undefined {
    return this.timeValue("DTSTAMP");
  }

  duration(): Duration | undefined {
    const property = this.property("DURATION");
    if (!property) return undefined;
    const value = property.typed();
    if (value.kind !== "duration") {
      throw new PropertyConversionError(property.name, property.raw, "expected a DURATION");
    }
    return value;
  }

  sequence(): number | undefined {
    const property = this.property("SEQUENCE");
    if (!property) return undefined;
    const value = property.typed();
    if (value.kind !== "integer") {
      throw new PropertyConversionError(property.name, property.raw, "expected an INTEGER");
    }
    return value.value;
  }

  /** Carries an RRULE or RDATE (EXRULE/EXDATE alone never add instances). */
  get isRecurring(): boolean {
    return this.hasProperty("RRULE") || this.hasProperty("RDATE");
  }

  requireUid(): string {
    const uid = this.uid;
    if (uid === undefined) throw new MissingRequiredPropertyError(this.name, "UID");
    return uid;
  }

  requireStamp(): TimeValue {
    const stamp = this.stamp();
    if (stamp === undefined) throw new MissingRequiredPropertyError(this.name, "DTSTAMP");
    return stamp;
  }

  toString(): string {
    const uid = this.hasProperty("UID") ? this.property("UID")?.raw : undefined;
    return uid ? `${this.name}(${uid})` : this.name;
  }
}
