import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { BatchService } from './batch/batch.service';
import { RENDER_CLIENT } from './constants';
import { WorkflowRepairService } from './discovery/workflow-repair.service';
import { WorkflowScannerService } from './discovery/workflow-scanner.service';
import { HttpRenderClient } from './render/http-render-client.service';
import { RenderBackendService } from './render/render-backend.service';
import { StatusReporterService } from './report/status-reporter.service';

@Module({
  imports: [ScheduleModule.forRoot(), ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    BatchService,
    StatusReporterService,
    WorkflowScannerService,
    WorkflowRepairService,
    RenderBackendService,
    HttpRenderClient,
    { provide: RENDER_CLIENT, useExisting: HttpRenderClient },
  ],
})
export class AppModule {}
