import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ReportCardModule, reportCardConfig } from './contexts/report-card';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [reportCardConfig],
      envFilePath: ['.env.local', '.env'],
    }),
    ReportCardModule,
  ],
})
export class AppModule {}
