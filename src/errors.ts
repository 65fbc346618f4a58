export type CardErrorKind = 'FontUnavailable' | 'InvalidLayout';

/** Base class for failures reported synchronously by the render core */
export class CardRenderError extends Error {
  readonly kind: CardErrorKind;

  constructor(kind: CardErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** No body font could be resolved; nothing can be drawn. */
export class FontUnavailableError extends CardRenderError {
  readonly candidates: string[];

  constructor(candidates: string[] = []) {
    super(
      'FontUnavailable',
      candidates.length ? `no body font found (tried ${candidates.length} paths)` : 'no body font supplied',
    );
    this.candidates = candidates;
  }
}

/** A layout box with unusable geometry was passed to the line breaker. */
export class InvalidLayoutError extends CardRenderError {
  constructor(message: string) {
    super('InvalidLayout', message);
  }
}
