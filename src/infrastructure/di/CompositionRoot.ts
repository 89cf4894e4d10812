import { PlannerPort } from '../../application/ports/PlannerPort';
import { WorkflowRepository } from '../../application/ports/WorkflowRepository';
import { ElementResolver } from '../../application/services/resolution/ElementResolver';
import { StateSignatureService } from '../../application/services/StateSignatureService';
import { WorkflowExecutor } from '../../application/services/WorkflowExecutor';
import { WorkflowCaptureService } from '../../application/services/WorkflowCaptureService';
import { PlaywrightBrowserAdapter } from '../browser/PlaywrightBrowserAdapter';
import { PlaywrightPageQuery } from '../browser/PlaywrightPageQuery';
import { PlaywrightSignalSource } from '../browser/PlaywrightSignalSource';
import { ConfigFactory } from '../config/ConfigFactory';
import { AppConfig, AppConfigOverrides } from '../config/ConfigSchema';
import { ScreenshotEvidenceCollector } from '../evidence/ScreenshotEvidenceCollector';
import { setGlobalLoggerConfig } from '../logging';
import { FileBasedWorkflowRepository } from '../persistence/FileBasedWorkflowRepository';
import { RuleBasedPlanner } from '../planning/RuleBasedPlanner';

export interface ApplicationContainer {
  config: AppConfig;
  browser: PlaywrightBrowserAdapter;
  repository: WorkflowRepository;
  captureService: WorkflowCaptureService;
  /** Closes the browser */
  close(): Promise<void>;
}

export interface CompositionOptions {
  overrides?: AppConfigOverrides;
  /** Defaults to the rule-based planner */
  planner?: PlannerPort;
}

export class CompositionRoot {
  static async initialize(options: CompositionOptions = {}): Promise<ApplicationContainer> {
    // 1. Configuration and logging
    const config = ConfigFactory.load(options.overrides);
    setGlobalLoggerConfig({ minLevel: config.logging.level, jsonOutput: config.logging.json });

    // 2. Browser and page adapters
    const browser = new PlaywrightBrowserAdapter({
      headless: config.browser.headless,
      timeout: config.browser.timeout,
      viewportWidth: config.browser.width,
      viewportHeight: config.browser.height,
      maxRetries: config.browser.maxRetries,
      retryBaseDelay: config.browser.retryBaseDelay,
    });
    await browser.initialize();

    const page = () => browser.getPage();
    const pageQuery = new PlaywrightPageQuery(page);
    const repository = new FileBasedWorkflowRepository(config.output.dir);
    const evidence = new ScreenshotEvidenceCollector(page, taskId => repository.getTaskDir(taskId));

    // 3. Engine
    const resolver = new ElementResolver(pageQuery, { menuRenderDelayMs: config.resolver.menuRenderDelay });
    const signatures = new StateSignatureService(new PlaywrightSignalSource(page));
    const executor = new WorkflowExecutor(
      { browser, pageQuery, resolver, signatures, evidence, repository },
      {
        maxConsecutiveErrors: config.executor.maxConsecutiveErrors,
        menuRetryDelayMs: config.executor.menuRetryDelay,
        menuProbeDelayMs: config.executor.menuProbeDelay,
        settleTimeoutMs: config.executor.settleTimeout,
        pollIntervalMs: config.executor.pollInterval,
        stabilityTimeoutMs: config.executor.stabilityTimeout,
        errorPauseMs: config.executor.errorPause,
        defaultWaitSeconds: config.executor.defaultWaitSeconds,
        defaultFillText: config.executor.defaultFillText,
      }
    );

    const captureService = new WorkflowCaptureService(
      { browser, pageQuery, planner: options.planner ?? new RuleBasedPlanner(), executor },
      { initialSettleMs: config.executor.stabilityTimeout }
    );

    return {
      config,
      browser,
      repository,
      captureService,
      close: () => browser.close(),
    };
  }
}
