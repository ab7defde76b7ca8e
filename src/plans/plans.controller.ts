import { Body, Controller, HttpCode, Post, UsePipes, ValidationPipe } from '@nestjs/common'
import { CompilePlanDto, ImportPlanDto } from './dto/compile-plan.dto'
import { ConvertWorkbookDto } from './dto/convert-workbook.dto'
import { ExportPlanDto, SelectWorkoutsDto } from './dto/select-workouts.dto'
import { PlansService } from './plans.service'

@Controller('plans')
@UsePipes(new ValidationPipe({ whitelist: true, forbidNonWhitelisted: true }))
export class PlansController {
  constructor(private readonly plansService: PlansService) {}

  @Post('compile')
  @HttpCode(200)
  compile(@Body() dto: CompilePlanDto) {
    return this.plansService.compile(dto)
  }

  @Post('import')
  @HttpCode(200)
  import(@Body() dto: ImportPlanDto) {
    return this.plansService.import(dto)
  }

  @Post('export')
  @HttpCode(200)
  export(@Body() dto: ExportPlanDto) {
    return this.plansService.export(dto)
  }

  @Post('delete')
  @HttpCode(200)
  delete(@Body() dto: SelectWorkoutsDto) {
    return this.plansService.delete(dto)
  }

  @Post('tcx')
  @HttpCode(200)
  tcx(@Body() dto: CompilePlanDto) {
    return this.plansService.toTcx(dto)
  }

  @Post('workbook')
  @HttpCode(200)
  workbook(@Body() dto: ConvertWorkbookDto) {
    return this.plansService.convertWorkbook(dto)
  }
}
