import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable, Writable } from 'stream';
import { buildApplication, buildTools } from '../../src/composition/container';
import { defaultConfig } from '../../src/config';
import type { EnvSettings } from '../../src/env';
import { initializeLogging } from '../../src/runtime/logging';

const env: EnvSettings = {
  openAiApiKey: 'test-key',
  openAiModel: 'test-model',
  debugMode: false,
  logFile: 'unused.log',
};

const sink = () =>
  new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

describe('buildTools', () => {
  test('registers only the configured tools', () => {
    const config = { ...defaultConfig(), tools: ['web_search', 'read_document'] };
    const { registry, documentTool } = buildTools(env, config, initializeLogging());

    expect(registry.list().map((tool) => tool.name)).toEqual(['web_search', 'read_document']);
    expect(documentTool?.name).toBe('read_document');
  });

  test('leaves out the document reader when it is disabled', () => {
    const config = { ...defaultConfig(), tools: ['create_file'] };
    const { registry, documentTool } = buildTools(env, config, initializeLogging());

    expect(registry.has('create_file')).toBe(true);
    expect(registry.has('web_search')).toBe(false);
    expect(documentTool).toBeUndefined();
  });
});

describe('buildApplication', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-app-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('wires the debug toggle to console echo and runs a session', async () => {
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(configPath, JSON.stringify({ outputDir: path.join(dir, 'out') }));
    const logging = initializeLogging({ logFile: path.join(dir, 'agent.log') });

    const app = buildApplication(
      { ...env, configPath },
      { logging, session: { input: Readable.from(['exit\n']), output: sink() } }
    );

    expect(logging.echoEnabled).toBe(false);
    expect(app.agent.toggleDebugMode()).toBe('Debug mode enabled');
    expect(logging.echoEnabled).toBe(true);
    logging.setEcho(false);

    await app.start();
    await app.shutdown();

    const log = fs.readFileSync(path.join(dir, 'agent.log'), 'utf8');
    expect(log).toContain(`INFO [agent] Loaded config from ${configPath}`);
  });
});
