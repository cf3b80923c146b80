export { DEFAULT_PAPERS, loadPaperList, parsePaperList, resolvePaperList } from './papers.js';
export { buildUnifiedResults, saveResults, serializeResults } from './results.js';
export {
    createPipelineDeps,
    processPapers,
    runPipeline,
    type MetadataSource,
    type PdfSource,
    type PipelineDeps,
} from './pipeline.js';
