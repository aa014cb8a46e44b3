import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ProfilesModule } from '../profiles/profiles.module';
import { ProgressionModule } from '../progression/progression.module';
import { PlanProgressController } from './plan-progress.controller';
import { PlanProgressService } from './plan-progress.service';
import { PlanProgress, PlanProgressSchema } from './schemas/plan-progress.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: PlanProgress.name, schema: PlanProgressSchema }]),
    ProgressionModule,
    ProfilesModule,
  ],
  controllers: [PlanProgressController],
  providers: [PlanProgressService],
  exports: [PlanProgressService],
})
export class PlanProgressModule {}
