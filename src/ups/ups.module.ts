import { Module } from '@nestjs/common';
import { COMMAND_RUNNER, execFileRunner } from '../common/command-runner';
import { UpsSourceService } from './ups-source.service';

/** UPS 데몬 조회 어댑터를 제공하는 Nest 모듈 */
@Module({
  providers: [UpsSourceService, { provide: COMMAND_RUNNER, useValue: execFileRunner }],
  exports: [UpsSourceService, COMMAND_RUNNER],
})
export class UpsModule {}
