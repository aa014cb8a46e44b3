import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ProfilesModule } from '../profiles/profiles.module';
import { ProgressionModule } from '../progression/progression.module';
import { CyclesController } from './cycles.controller';
import { CyclesService } from './cycles.service';
import { PlanCycle, PlanCycleSchema } from './schemas/plan-cycle.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: PlanCycle.name, schema: PlanCycleSchema }]),
    ProgressionModule,
    ProfilesModule,
  ],
  controllers: [CyclesController],
  providers: [CyclesService],
  exports: [CyclesService],
})
export class CyclesModule {}
