import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { loadPlannerConfig, logLevelsUpTo } from './config/planner-config'

async function bootstrap() {
  const config = loadPlannerConfig()
  const app = await NestFactory.create(AppModule, { logger: logLevelsUpTo(config.logLevel) })

  app.enableShutdownHooks()

  await app.listen(config.port)
  Logger.log(`listening on port ${config.port}`, 'Bootstrap')
}

bootstrap().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap')
  process.exitCode = 1
})
