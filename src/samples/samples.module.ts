import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UpsSampleEntity } from '../persistence/ups-sample.entity';
import { SampleStoreService } from './sample-store.service';

@Module({
  imports: [TypeOrmModule.forFeature([UpsSampleEntity])],
  providers: [SampleStoreService],
  exports: [SampleStoreService],
})
export class SamplesModule {}
