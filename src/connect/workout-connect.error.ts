/** The workout service could not be reached or answered with an error. */
export class WorkoutConnectError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message)
    this.name = 'WorkoutConnectError'
  }
}
