import { Router } from 'express';
import { ToolController } from '../controllers/toolController.js';
import { ScreenshotToolService } from '../services/tools/ScreenshotToolService.js';
import { validateRequest } from '../middleware/validation.js';
import { TOOL_NAMES, toolSchemas } from '../validation/toolSchemas.js';

// Router factory: the tool service comes from the caller's ServiceContext
export const createApiRouter = (toolService: ScreenshotToolService): Router => {
  const router = Router();
  const toolController = new ToolController(toolService);

  router.get('/tools', (req, res, next) => toolController.listTools(req, res, next));

  // One route per tool; unknown tool names fall through to the 404 handler
  for (const name of TOOL_NAMES) {
    router.post(
      `/tools/${name}`,
      validateRequest(toolSchemas[name], 'body'),
      toolController.handle(name)
    );
  }

  router.get('/statistics', (req, res, next) => toolController.getStatistics(req, res, next));

  return router;
};
