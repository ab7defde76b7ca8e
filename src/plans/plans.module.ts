import { Module } from '@nestjs/common'
import { ConnectModule } from '../connect/connect.module'
import { PlansController } from './plans.controller'
import { PlansService } from './plans.service'

@Module({
  imports: [ConnectModule],
  controllers: [PlansController],
  providers: [PlansService],
})
export class PlansModule {}
