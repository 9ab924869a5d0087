export class OperatorConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OperatorConfigError'
  }
}
