import type { AutowaitConfig } from "../config";
import type { Document } from "../browser/document";
import type { BrowserDriver } from "../browser/driver-types";
import type { Browser, IsolatedSession } from "../browser/nodes";
import type { SessionHierarchy } from "../browser/session-hierarchy";
import type { FixtureHandle, FixtureRegistry } from "./fixture-registry";

export type BrowserLauncher = (config: AutowaitConfig) => Promise<BrowserDriver>;

export type BrowserFixtures = {
  browser: FixtureHandle<Browser>;
  session: FixtureHandle<IsolatedSession>;
  document: FixtureHandle<Document>;
};

/**
 * One browser per worker, a fresh isolated session and document per test.
 * Closing a test scope closes its session, which takes its documents with it.
 */
export function registerBrowserFixtures(
  registry: FixtureRegistry,
  deps: { hierarchy: SessionHierarchy; launch: BrowserLauncher }
): BrowserFixtures {
  const browser = registry.register<Browser>({
    name: "browser",
    scope: "worker",
    setup: async (_deps, scope) => {
      const driver = await deps.launch(deps.hierarchy.config);
      return deps.hierarchy.registerBrowser(driver, { label: `worker-${scope.id.slice(0, 8)}` });
    },
    teardown: (value) => value.close()
  });

  const session = registry.register<IsolatedSession>({
    name: "session",
    scope: "test",
    dependencies: ["browser"],
    setup: (fixtures) => fixtures.use(browser).newSession(),
    teardown: (value) => value.close()
  });

  const document = registry.register<Document>({
    name: "document",
    scope: "test",
    dependencies: ["session"],
    setup: (fixtures) => fixtures.use(session).newDocument(),
    teardown: (value) => value.close()
  });

  return { browser, session, document };
}
