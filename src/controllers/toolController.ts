import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ScreenshotToolService } from '../services/tools/ScreenshotToolService.js';
import { ToolName, TOOL_NAMES } from '../validation/toolSchemas.js';

export class ToolController {
  constructor(private toolService: ScreenshotToolService) {}

  /**
   * List available tool names
   */
  async listTools(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json({ tools: TOOL_NAMES });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Handler running one tool with the (already validated) request body as arguments
   */
  handle(name: ToolName): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const result = await this.toolService.callTool(name, req.body);
        res.json(result);
      } catch (error) {
        next(error);
      }
    };
  }

  /**
   * File counts per category folder
   */
  async getStatistics(_req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const statistics = await this.toolService.getStatistics();
      res.json(statistics);
    } catch (error) {
      next(error);
    }
  }
}
