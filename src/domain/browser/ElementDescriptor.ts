import { ValueObject } from '../shared/ValueObject';

/**
 * Bounding rectangle in viewport coordinates.
 */
export interface BoundingRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Properties for an ElementDescriptor value object.
 */
export interface ElementDescriptorProps {
  /** Lowercase HTML tag name (e.g. 'button', 'a', 'input') */
  tag: string;
  /** Trimmed visible text content, truncated by the enumerator */
  text: string;
  /** Accessible name (aria-label) if present */
  accessibleName?: string;
  /** Element id if present */
  id?: string;
  /** Class list in document order */
  classes: string[];
  /** Placeholder text for inputs */
  placeholder?: string;
  /** data-testid attribute if present */
  testId?: string;
  /** Input type for form controls */
  inputType?: string;
  /** Whether the element is rendered and visible */
  isVisible: boolean;
  /** Bounding rectangle at enumeration time */
  boundingBox: BoundingRect;
}

/**
 * A DOM-queryable candidate produced fresh for each resolution call.
 */
export class ElementDescriptor extends ValueObject<ElementDescriptorProps> {
  private constructor(props: ElementDescriptorProps) {
    super(props);
  }

  public static create(props: ElementDescriptorProps): ElementDescriptor {
    return new ElementDescriptor({
      ...props,
      tag: props.tag.toLowerCase(),
      classes: [...props.classes],
      boundingBox: { ...props.boundingBox },
    });
  }

  public get tag(): string {
    return this.props.tag;
  }

  public get text(): string {
    return this.props.text;
  }

  public get accessibleName(): string | undefined {
    return this.props.accessibleName;
  }

  public get id(): string | undefined {
    return this.props.id;
  }

  public get classes(): string[] {
    return [...this.props.classes];
  }

  public get placeholder(): string | undefined {
    return this.props.placeholder;
  }

  public get testId(): string | undefined {
    return this.props.testId;
  }

  public get inputType(): string | undefined {
    return this.props.inputType;
  }

  public get isVisible(): boolean {
    return this.props.isVisible;
  }

  public get boundingBox(): BoundingRect {
    return { ...this.props.boundingBox };
  }

  /**
   * Lowercased text, accessible name and placeholder joined by spaces.
   * This is the haystack the fuzzy scorer searches.
   */
  public searchableText(): string {
    return [this.props.text, this.props.accessibleName ?? '', this.props.placeholder ?? '']
      .join(' ')
      .toLowerCase();
  }

  /**
   * Returns a human-readable description of this element.
   */
  public describe(): string {
    const parts: string[] = [`<${this.tag}>`];

    if (this.text) {
      parts.push(`"${this.text.substring(0, 50)}${this.text.length > 50 ? '...' : ''}"`);
    } else if (this.accessibleName) {
      parts.push(`aria: "${this.accessibleName}"`);
    } else if (this.placeholder) {
      parts.push(`placeholder: "${this.placeholder}"`);
    } else if (this.id) {
      parts.push(`#${this.id}`);
    }

    return parts.join(' ');
  }

  public toJSON(): ElementDescriptorProps {
    return { ...this.props, classes: [...this.props.classes], boundingBox: this.boundingBox };
  }
}
