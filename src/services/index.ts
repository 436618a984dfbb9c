export { healthService, HealthService } from './health.service';
export { sessionService } from './session.service';
export * from './session.service';
export { searchService } from './search.service';
export * from './search.service';
export { stagingService } from './staging.service';
export * from './staging.service';
export { csvRewriteService } from './csvRewrite.service';
export * from './csvRewrite.service';
