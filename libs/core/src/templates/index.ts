export { getTemplatesDir, readTemplate, readCommandTemplates } from './loader';
export { REVIEW_COMMAND, renderReviewCommand, reviewCommandTemplate } from './review';
