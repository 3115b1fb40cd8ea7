import { Controller, Get } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

  /**
   * Health check, including whether the holdings store is open.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    const connected = this.dataSource.isInitialized;
    return {
      status: connected ? 'ok' : 'error',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'holdings-ledger',
      store: connected ? 'connected' : 'disconnected',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Holdings Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        stocks: '/holdings/stocks',
        stock: '/holdings/stocks/:symbol',
        bonds: '/holdings/bonds',
      },
    };
  }
}
