export class EdaPlotError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'EdaPlotError'
  }
}

/** No reference value satisfies the requested direction (e.g. a half-recovery before every peak). */
export class NoMatchError extends EdaPlotError {
  constructor(message: string) {
    super(message)
    this.name = 'NoMatchError'
  }
}

/** Columns or index sets disagree with the table's sample range. */
export class ShapeError extends EdaPlotError {
  constructor(message: string) {
    super(message)
    this.name = 'ShapeError'
  }
}

export class IntegrationError extends EdaPlotError {
  readonly dependency: string

  constructor(dependency: string, message: string) {
    super(message)
    this.name = 'IntegrationError'
    this.dependency = dependency
  }
}
