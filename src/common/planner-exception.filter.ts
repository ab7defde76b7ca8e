import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common'
import type { Response } from 'express'
import { WorkoutConnectError } from '../connect/workout-connect.error'
import { PlannerError } from './planner-errors'
import type { PlannerErrorContext } from './planner-errors'

export type PlannerErrorResponse = {
  status: number
  body: {
    statusCode: number
    error: string
    message: string
    context?: PlannerErrorContext
    upstreamStatus?: number
  }
}

/**
 * Planner failures are the caller's input: 422 with the error code and context.
 * Workout service failures surface as 502.
 */
export const toErrorResponse = (exception: PlannerError | WorkoutConnectError): PlannerErrorResponse => {
  if (exception instanceof PlannerError) {
    const status = HttpStatus.UNPROCESSABLE_ENTITY
    return {
      status,
      body: { statusCode: status, error: exception.code, message: exception.message, context: exception.context },
    }
  }
  const status = HttpStatus.BAD_GATEWAY
  return {
    status,
    body: {
      statusCode: status,
      error: 'WORKOUT_SERVICE',
      message: exception.message,
      ...(exception.status !== undefined ? { upstreamStatus: exception.status } : {}),
    },
  }
}

@Catch(PlannerError, WorkoutConnectError)
export class PlannerExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(PlannerExceptionFilter.name)

  catch(exception: PlannerError | WorkoutConnectError, host: ArgumentsHost) {
    const { status, body } = toErrorResponse(exception)
    if (status === HttpStatus.UNPROCESSABLE_ENTITY) this.logger.warn(`${body.error}: ${body.message}`)
    else this.logger.error(`workout service: ${body.message}`)

    host.switchToHttp().getResponse<Response>().status(status).json(body)
  }
}
