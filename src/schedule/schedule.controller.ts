import { Body, Controller, Get, HttpCode, Post, Query, UsePipes, ValidationPipe } from '@nestjs/common'
import { ListScheduledDto } from './dto/list-scheduled.dto'
import { SchedulePlanDto, UnschedulePlanDto } from './dto/schedule-plan.dto'
import { ScheduleService } from './schedule.service'

@Controller('schedule')
export class ScheduleController {
  constructor(private readonly scheduleService: ScheduleService) {}

  @Post('simulate')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  simulate(@Body() dto: SchedulePlanDto) {
    return this.scheduleService.simulate(dto)
  }

  @Post()
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  schedule(@Body() dto: SchedulePlanDto) {
    return this.scheduleService.schedule(dto)
  }

  @Post('unschedule')
  @HttpCode(200)
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  unschedule(@Body() dto: UnschedulePlanDto) {
    return this.scheduleService.unschedule(dto)
  }

  @Get()
  @UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
  list(@Query() query: ListScheduledDto) {
    return this.scheduleService.listScheduled(query)
  }
}
