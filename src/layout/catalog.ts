// catalog.ts
import { readFile } from 'node:fs/promises';
import { ConfigurationError, describeError } from '../errors';
import { LayoutDocumentSchema } from './document';

export type ElementKind = 'icon' | 'region' | 'text';

/** [x, y, width, height] in full-frame pixels. */
export type PixelBox = readonly [number, number, number, number];

export interface LayoutElement {
  readonly id: string;
  readonly kind: ElementKind;
  readonly required: boolean;
  readonly bbox: PixelBox;
  readonly label?: string;
  readonly iconFile?: string;
  /** Region element an icon sits in, e.g. "desktop" or "taskbar". */
  readonly region?: string;
}

export interface ClickTemplate {
  readonly id: string;
  readonly element: string;
  readonly action: 'left_click' | 'double_click';
  /** Prompt text with an `[icon_label]` placeholder. */
  readonly prompt: string;
}

export interface ScreenSpec {
  readonly name: string;
  readonly width: number;
  readonly height: number;
}

/**
 * Read-only view of a screen's addressable elements. Built once per process
 * and shared by every scene; nothing in it is mutated after construction.
 */
export class LayoutCatalog {
  readonly version: string;
  readonly screen: ScreenSpec;
  readonly elements: readonly LayoutElement[];
  readonly templates: readonly ClickTemplate[];
  readonly loadingIndicatorId?: string;
  private byId: Map<string, LayoutElement>;

  constructor(opts: {
    version: string;
    screen: ScreenSpec;
    elements: LayoutElement[];
    templates?: ClickTemplate[];
    loadingIndicatorId?: string;
  }) {
    this.version = opts.version;
    this.screen = Object.freeze({ ...opts.screen });
    this.elements = Object.freeze(opts.elements.map(e => {
      const [x, y, w, h] = e.bbox;
      return Object.freeze({ ...e, bbox: Object.freeze([x, y, w, h] as const) });
    }));
    this.templates = Object.freeze((opts.templates ?? []).map(t => Object.freeze({ ...t })));
    this.loadingIndicatorId = opts.loadingIndicatorId;
    this.byId = new Map();
    for (const el of this.elements) {
      if (this.byId.has(el.id)) throw new ConfigurationError(`Duplicate layout element id "${el.id}"`);
      this.byId.set(el.id, el);
    }
    this.validate();
  }

  get(id: string): LayoutElement | undefined {
    return this.byId.get(id);
  }

  require(id: string): LayoutElement {
    const el = this.byId.get(id);
    if (!el) throw new ConfigurationError(`Layout element "${id}" is not in catalog ${this.screen.name}@${this.version}`);
    return el;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** Icons of a region, in document order. */
  icons(region: string): LayoutElement[] {
    return this.elements.filter(e => e.kind === 'icon' && e.region === region);
  }

  requiredIcons(region: string): LayoutElement[] {
    return this.icons(region).filter(e => e.required);
  }

  optionalIcons(region: string): LayoutElement[] {
    return this.icons(region).filter(e => !e.required);
  }

  templatesFor(elementId: string): ClickTemplate[] {
    return this.templates.filter(t => t.element === elementId);
  }

  labelOf(id: string): string {
    return this.require(id).label ?? id;
  }

  /** Orders ids by their position in the document. */
  inCatalogOrder(ids: Iterable<string>): string[] {
    const wanted = new Set(ids);
    return this.elements.filter(e => wanted.has(e.id)).map(e => e.id);
  }

  private validate() {
    const { width, height } = this.screen;
    for (const el of this.elements) {
      const [x, y, w, h] = el.bbox;
      if (x + w > width || y + h > height) {
        throw new ConfigurationError(`Element "${el.id}" [${el.bbox.join(', ')}] lies outside the ${width}x${height} screen`);
      }
      if (el.kind === 'icon') {
        if (!el.region) throw new ConfigurationError(`Icon "${el.id}" does not name its region`);
        const region = this.byId.get(el.region);
        if (!region || region.kind !== 'region') {
          throw new ConfigurationError(`Icon "${el.id}" references unknown region "${el.region}"`);
        }
      }
    }
    for (const t of this.templates) {
      const target = this.byId.get(t.element);
      if (!target || target.kind !== 'region') {
        throw new ConfigurationError(`Task "${t.id}" targets unknown region "${t.element}"`);
      }
    }
    if (this.loadingIndicatorId !== undefined && !this.byId.has(this.loadingIndicatorId)) {
      throw new ConfigurationError(`Loading indicator "${this.loadingIndicatorId}" is not a layout element`);
    }
  }
}

export function parseCatalog(doc: unknown): LayoutCatalog {
  const parsed = LayoutDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid layout document at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  const d = parsed.data;
  return new LayoutCatalog({
    version: d.version,
    screen: d.screen,
    elements: d.elements.map(e => ({
      id: e.id,
      kind: e.kind,
      required: e.required,
      bbox: e.bbox,
      label: e.label,
      iconFile: e.icon,
      region: e.region,
    })),
    templates: d.tasks,
    loadingIndicatorId: d.loadingIndicator,
  });
}

export async function loadCatalog(path: string): Promise<LayoutCatalog> {
  const text = await readFile(path, 'utf8');
  let doc: unknown;
  try {
    doc = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Layout document ${path} is not valid JSON: ${describeError(err)}`);
  }
  return parseCatalog(doc);
}
