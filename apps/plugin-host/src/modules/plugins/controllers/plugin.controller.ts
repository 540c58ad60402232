import { Body, Controller, Get, HttpCode, Param, Post, Query } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import type { PluginManifest } from '@plugforge/shared';
import { createLogger } from '../../../common/logging/logger';
import { SkipCacheQuerySchema, type ExecuteNodeResponse } from '../dtos/execution-request.dto';
import type { ValidationResult } from '../interfaces/plugin-definition.interface';
import type { ShapeDescription } from '../sdk/manifest';
import { PluginExecutionService, type NodeSummary } from '../services/plugin-execution.service';

const logger = createLogger('PluginController');

@ApiTags('plugin')
@Controller()
export class PluginController {
  constructor(private readonly executionService: PluginExecutionService) {}

  @Get('manifest')
  @ApiOperation({ summary: 'Manifest of the served plugin' })
  getManifest(): PluginManifest {
    return this.executionService.getManifest();
  }

  @Post('validate-config')
  @HttpCode(200)
  @ApiOperation({ summary: 'Validate a plugin configuration' })
  async validateConfig(@Body() body: unknown): Promise<ValidationResult> {
    logger.debug('POST /validate-config');
    return this.executionService.validateConfig(body ?? {});
  }

  @Get('nodes')
  @ApiOperation({ summary: 'List the nodes of the served plugin' })
  listNodes(): { plugin: string; nodes: NodeSummary[] } {
    return this.executionService.listNodes();
  }

  @Post('nodes/:name/execute')
  @HttpCode(200)
  @ApiOperation({ summary: 'Execute a node' })
  async executeNode(@Param('name') name: string, @Body() body: unknown): Promise<ExecuteNodeResponse> {
    logger.debug({ node: name }, 'POST /nodes/:name/execute');
    return this.executionService.executeNode(name, body);
  }

  @Post('nodes/:name/config')
  @HttpCode(200)
  @ApiOperation({ summary: 'Resolve the configuration of a node' })
  async getNodeConfig(
    @Param('name') name: string,
    @Body() body: unknown,
    @Query('skipCache') skipCache?: string,
  ): Promise<unknown> {
    logger.debug({ node: name }, 'POST /nodes/:name/config');
    return this.executionService.getNodeConfig(name, body ?? {}, SkipCacheQuerySchema.parse(skipCache));
  }

  @Post('integrations/:type/config')
  @HttpCode(200)
  @ApiOperation({ summary: 'Describe the credentials of an integration' })
  getIntegrationConfig(@Param('type') type: string): ShapeDescription {
    logger.info({ integration: type }, 'POST /integrations/:type/config');
    return this.executionService.getIntegrationConfig(type);
  }

  @Post('integrations/:type/ready')
  @HttpCode(200)
  @ApiOperation({ summary: 'Check whether credentials make an integration ready' })
  async checkIntegrationReady(@Param('type') type: string, @Body() body: unknown): Promise<boolean> {
    logger.info({ integration: type }, 'POST /integrations/:type/ready');
    return this.executionService.checkIntegrationReady(type, body);
  }
}
