/**
 * Parsing Router - parse exam text into question records and read stored results
 */

import express from 'express';
import type { ParsingController } from '../controllers/ParsingController.js';

export function createParsingRouter(controller: ParsingController): express.Router {
  const router = express.Router();

  router.post('/exams', controller.parseExams);
  router.get('/exams', controller.listExams);
  router.get('/exams/:examId', controller.getExam);

  return router;
}
