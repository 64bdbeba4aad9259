export { Reranker, SIMILARITY_THRESHOLD, dedupeByLink } from './reranker';
export { cosineSimilarity, roundScore } from './similarity';
export { DOMAIN_BOOSTS, PDF_BOOST, WIKIPEDIA_BOOST, domainPrior, documentTypeBoost } from './priors';
