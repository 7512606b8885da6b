export class GeometryError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'GeometryError'
  }
}

// Caller bug: an operation that needs at least one point got none.
export class EmptyInputError extends GeometryError {
  constructor(message: string) {
    super(message)
    this.name = 'EmptyInputError'
  }
}

export class InvalidParameterError extends GeometryError {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidParameterError'
  }
}
