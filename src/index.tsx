#!/usr/bin/env node
import React, { useEffect } from 'react';
import { render, useApp, useStdout } from 'ink';
import { Command } from 'commander';
import { Engine } from './engine/Engine.js';
import { Renderer } from './engine/Renderer.js';
import { CURSOR_HOME, CLEAR_SCREEN, RESET } from './utils/Colors.js';
import { getEngineLog, logError, logInfo, logWarn } from './utils/Log.js';
import {
  QUALITY_LEVELS,
  loadRenderSettings,
  mergeRenderSettings,
  saveRenderSettings,
} from './config/RenderSettings.js';
import { DEMO_NAMES, DEMO_SCENES, isDemoName, type DemoName } from './demo/index.js';

const VERSION = '0.1.0';
const LOG_LINES = 3;
const ERASE_LINE = '\x1b[K';
const CTRL_C = '\x03';
const ESCAPE = '\x1b';

interface DemoProps {
  engine: Engine;
}

function terminalSize(stdout: NodeJS.WriteStream | undefined): { width: number; height: number } {
  const width = stdout?.columns || 80;
  const height = stdout?.rows ? stdout.rows - 2 : 22;
  return { width, height };
}

function Demo({ engine }: DemoProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();

  // Keyboard: raw stdin, one binding per character
  useEffect(() => {
    const handleData = (data: Buffer) => {
      const str = data.toString();
      if (str === ESCAPE || str.includes(CTRL_C)) {
        exit();
        return;
      }
      // Ignore arrow keys and other escape sequences
      if (str.startsWith(ESCAPE)) {
        return;
      }
      for (const ch of str) {
        engine.handleKey(ch);
      }
    };

    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on('data', handleData);

    return () => {
      process.stdin.setRawMode(false);
      process.stdin.pause();
      process.stdin.off('data', handleData);
    };
  }, [engine, exit]);

  // Render loop
  useEffect(() => {
    let running = true;
    let timer: NodeJS.Timeout | undefined;
    let lastSize = terminalSize(stdout);
    const log = getEngineLog();

    const frame = () => {
      if (!running) return;

      const size = terminalSize(stdout);
      if (size.width !== lastSize.width || size.height !== lastSize.height) {
        engine.resize(size.width, size.height);
        lastSize = size;
        process.stdout.write(CLEAR_SCREEN);
        logInfo(`Resized to ${engine.renderer.getCharWidth()}x${engine.renderer.getCharHeight()}`);
      }

      const lines = engine.renderFrame();
      let output = CURSOR_HOME + lines.join('\n');

      // Overlays are drawn on top of the frame from the first row down
      const overlay: string[] = engine.isShowingStatus() ? engine.getStatusLines() : [];
      overlay.push(...log.render(size.width, LOG_LINES));
      output += CURSOR_HOME;
      for (const line of overlay) {
        output += RESET + line + RESET + ERASE_LINE + '\n';
      }

      process.stdout.write(output);
      timer = setTimeout(frame, engine.timer.getSleepTime());
    };

    process.stdout.write(engine.getTitleSequence());
    Renderer.enterFullscreen();
    frame();

    return () => {
      running = false;
      if (timer) clearTimeout(timer);
      Renderer.exitFullscreen();
    };
  }, [engine, stdout]);

  // Ink only owns input; frames go straight to stdout
  return null;
}

interface CliOptions {
  scene: string;
  quality?: string;
  fps?: string;
  status: boolean;
  save: boolean;
}

function parseNumberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    logWarn(`Ignoring --${name} ${value}: not a number`);
    return undefined;
  }
  return n;
}

function bindQualityKeys(engine: Engine): void {
  QUALITY_LEVELS.forEach((_, level) => {
    engine.setKeyBinding(String(level), () => {
      engine.setRenderQuality(level);
      logInfo(`Quality ${level} (factor ${engine.renderer.getResolutionFactor().toFixed(2)})`);
    });
  });
}

async function run(options: CliOptions): Promise<void> {
  if (!isDemoName(options.scene)) {
    throw new Error(`Unknown scene "${options.scene}", expected one of: ${DEMO_NAMES.join(', ')}`);
  }
  const sceneName: DemoName = options.scene;

  const stored = await loadRenderSettings();
  const settings = mergeRenderSettings(stored, {
    quality: parseNumberOption('quality', options.quality),
    targetFps: parseNumberOption('fps', options.fps),
    showStatus: options.status ? undefined : false,
  });
  const { width, height } = terminalSize(process.stdout);
  const engine = new Engine({ width, height, settings });
  // Routed through the engine so an unknown level falls back with a warning
  engine.setRenderQuality(settings.quality);

  const demo = DEMO_SCENES[sceneName];
  engine.setTitle(`halfblock3d - ${demo.title}`);
  demo.setup(engine);
  bindQualityKeys(engine);
  engine.logSummary();

  const { waitUntilExit } = render(<Demo engine={engine} />);
  await waitUntilExit();

  if (options.save) {
    await saveRenderSettings({
      quality: engine.getQuality(),
      targetFps: engine.timer.getTargetFps(),
      fov: engine.camera.fov,
      showStatus: engine.isShowingStatus(),
    });
  }
}

// Main entry point
async function main() {
  const program = new Command();

  program
    .name('halfblock3d')
    .description('Software 3D renderer drawing to the terminal with half-block characters')
    .version(VERSION)
    .option('-s, --scene <name>', `Demo scene (${DEMO_NAMES.join(', ')})`, 'orbit')
    .option('-q, --quality <level>', `Quality level 0-${QUALITY_LEVELS.length - 1}`)
    .option('-f, --fps <n>', 'Target frames per second')
    .option('--no-status', 'Hide the status overlay')
    .option('--save', 'Store quality, fps and fov in the settings file on exit', false)
    .action(async (options: CliOptions) => {
      await run(options);
    });

  await program.parseAsync();
}

main().catch(error => {
  logError(String(error));
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
