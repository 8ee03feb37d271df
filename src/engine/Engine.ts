import { Vector3 } from './math/Vector3.js';
import { clamp } from './math/MathUtils.js';
import { Camera } from './Camera.js';
import { Scene } from './Scene.js';
import { SceneNode } from './SceneNode.js';
import { Mesh } from './Mesh.js';
import { Renderer } from './Renderer.js';
import { FrameTimer, type Clock } from './FrameTimer.js';
import {
  createDirectionalLight,
  createPointLight,
  createSpotLight,
  describeLight,
  type Light,
} from './Light.js';
import { Color, SET_TITLE } from '../utils/Colors.js';
import {
  DEFAULT_RENDER_SETTINGS,
  FALLBACK_QUALITY,
  isValidQuality,
  mergeRenderSettings,
  qualityFactor,
  type RenderSettings,
} from '../config/RenderSettings.js';
import { logInfo, logWarn } from '../utils/Log.js';

export const MIN_CHAR_WIDTH = 30;
export const MIN_CHAR_HEIGHT = 12;

export interface EngineOptions {
  width: number;
  height: number;
  settings?: Partial<RenderSettings>;
  clock?: Clock;
}

export type KeyAction = () => void;
export type UpdateCallback = (dt: number) => void;

/**
 * Host-facing facade: owns the scene, camera, renderer and frame timer, and
 * exposes the scene, camera and quality controls used by applications.
 */
export class Engine {
  public readonly scene: Scene;
  public readonly camera: Camera;
  public readonly renderer: Renderer;
  public readonly timer: FrameTimer;

  private quality: number;
  private showStatus: boolean;
  private title: string = '';
  private keyBindings: Map<string, KeyAction> = new Map();
  private onUpdate?: UpdateCallback;

  constructor(options: EngineOptions) {
    const settings = mergeRenderSettings(DEFAULT_RENDER_SETTINGS, options.settings);

    this.scene = new Scene();
    this.camera = new Camera({ fov: settings.fov });
    this.quality = isValidQuality(settings.quality) ? settings.quality : FALLBACK_QUALITY;
    this.showStatus = settings.showStatus;

    this.renderer = new Renderer(
      Math.max(MIN_CHAR_WIDTH, Math.floor(options.width)),
      Math.max(MIN_CHAR_HEIGHT, Math.floor(options.height)),
      qualityFactor(this.quality)
    );
    this.renderer.setClearColor(Color.fromArray(settings.clearColor));
    this.renderer.setAmbientLight(Color.fromArray(settings.ambientLight));

    this.timer = new FrameTimer(settings.targetFps, options.clock);
  }

  // === Scene ===

  addNode(name: string, parent?: SceneNode): SceneNode {
    return this.scene.add(new SceneNode({ name }), parent);
  }

  addMeshNode(mesh: Mesh, name: string = 'mesh', parent?: SceneNode): SceneNode {
    return this.scene.add(new SceneNode({ name, mesh }), parent);
  }

  addLightNode(light: Light, name: string = 'light', parent?: SceneNode): SceneNode {
    return this.scene.add(new SceneNode({ name, light }), parent);
  }

  addDirectionalLight(direction: Vector3, color: Color = Color.white(), intensity: number = 1, name: string = 'sun'): SceneNode {
    return this.addLightNode(createDirectionalLight(direction, color, intensity), name);
  }

  addPointLight(position: Vector3, color: Color = Color.white(), intensity: number = 1, name: string = 'point'): SceneNode {
    return this.addLightNode(createPointLight(position, color, intensity), name);
  }

  // Angles are half-angles in radians
  addSpotLight(
    position: Vector3,
    direction: Vector3,
    color: Color = Color.white(),
    intensity: number = 1,
    innerAngle?: number,
    outerAngle?: number,
    name: string = 'spot'
  ): SceneNode {
    return this.addLightNode(
      createSpotLight(position, direction, color, intensity, innerAngle, outerAngle),
      name
    );
  }

  removeNode(node: SceneNode): boolean {
    return this.scene.remove(node);
  }

  getNode(name: string): SceneNode | null {
    return this.scene.getNode(name);
  }

  findByName(pattern: string): SceneNode[] {
    return this.scene.findByName(pattern);
  }

  findByTag(...tags: string[]): SceneNode[] {
    return this.scene.findByTag(...tags);
  }

  findByAllTags(...tags: string[]): SceneNode[] {
    return this.scene.findByAllTags(...tags);
  }

  // === Camera ===

  setCameraPosition(x: number, y: number, z: number): void {
    this.camera.setPosition(x, y, z);
  }

  setCameraRotation(pitch: number, yaw: number, roll: number): void {
    this.camera.setRotation(pitch, yaw, roll);
  }

  moveCamera(dx: number = 0, dy: number = 0, dz: number = 0): void {
    this.camera.translate(dx, dy, dz);
  }

  rotateCamera(dPitch: number = 0, dYaw: number = 0, dRoll: number = 0): void {
    this.camera.rotate(dPitch, dYaw, dRoll);
  }

  setCameraZoom(zoom: number): void {
    this.camera.setZoom(zoom);
  }

  zoomCamera(delta: number): void {
    this.camera.setZoom(this.camera.zoom + delta);
  }

  setCameraFov(degrees: number): void {
    this.camera.setFov(degrees);
  }

  changeFov(delta: number): void {
    this.camera.setFov(this.camera.fov + delta);
  }

  // Camera at (0, 0, stepBack) with default zoom, fov and rotation
  resetCamera(stepBack: number): void {
    this.camera.setPosition(0, 0, stepBack);
    this.camera.setZoom(1.0);
    this.camera.setFov(60);
    this.camera.setRotation(0, 0, 0);
  }

  // === Appearance ===

  setAmbientLight(r: number, g: number, b: number): void {
    this.renderer.setAmbientLight(new Color(clamp(r, 0, 255), clamp(g, 0, 255), clamp(b, 0, 255)));
  }

  setClearColor(r: number, g: number, b: number): void {
    this.renderer.setClearColor(new Color(clamp(r, 0, 255), clamp(g, 0, 255), clamp(b, 0, 255)));
  }

  /**
   * Quality level 0-7 picks the supersampling factor. Unknown levels log a
   * warning and select level 2.
   */
  setRenderQuality(level: number): void {
    if (!isValidQuality(level)) {
      logWarn(`Invalid quality level ${level}, using ${FALLBACK_QUALITY}`);
      this.setRenderQuality(FALLBACK_QUALITY);
      return;
    }
    this.quality = level;
    this.renderer.setResolutionFactor(qualityFactor(level));
  }

  getQuality(): number {
    return this.quality;
  }

  // Any positive factor, bypassing the quality table
  setResolutionFactor(factor: number): void {
    this.renderer.setResolutionFactor(factor);
  }

  resize(width: number, height: number): void {
    this.renderer.resize(
      Math.max(MIN_CHAR_WIDTH, Math.floor(width)),
      Math.max(MIN_CHAR_HEIGHT, Math.floor(height))
    );
  }

  setTargetFps(fps: number): void {
    this.timer.setTargetFps(fps);
  }

  setTitle(title: string): void {
    this.title = String(title);
  }

  getTitle(): string {
    return this.title;
  }

  // Escape sequence that sets the terminal window title
  getTitleSequence(): string {
    return SET_TITLE(this.title);
  }

  setShowStatus(show: boolean): void {
    this.showStatus = show;
  }

  isShowingStatus(): boolean {
    return this.showStatus;
  }

  // === Input & update ===

  setKeyBinding(key: string, action: KeyAction): void {
    this.keyBindings.set(key.toLowerCase(), action);
  }

  removeKeyBinding(key: string): boolean {
    return this.keyBindings.delete(key.toLowerCase());
  }

  // Returns true when a binding ran
  handleKey(key: string): boolean {
    const action = this.keyBindings.get(key.toLowerCase());
    if (!action) {
      return false;
    }
    action();
    return true;
  }

  setOnUpdate(callback: UpdateCallback | undefined): void {
    this.onUpdate = callback;
  }

  update(dt: number): void {
    if (this.onUpdate) {
      this.onUpdate(dt);
    }
    this.scene.traverse(node => {
      node.wrapRotation();
    });
  }

  /**
   * Advance the timer, run the update callback and render the scene.
   */
  renderFrame(): string[] {
    const dt = this.timer.tick();
    this.update(dt);
    return this.renderer.renderAndComposite(this.scene, this.camera);
  }

  // === Status ===

  getStatusLines(): string[] {
    const stats = this.scene.getStats();
    const cam = this.camera;
    const lines = [
      `FPS: ${this.timer.getFps().toFixed(1)} | Quality: ${this.quality}`,
      `Cam Pos: (${cam.position.x.toFixed(2)}, ${cam.position.y.toFixed(2)}, ${cam.position.z.toFixed(2)})`,
      `Cam Rot: (${cam.rotation.x.toFixed(2)}, ${cam.rotation.y.toFixed(2)}, ${cam.rotation.z.toFixed(2)})`,
      `Zoom: ${cam.zoom.toFixed(2)} | FOV: ${cam.fov.toFixed(1)}°`,
      `Scene: ${stats.meshNodes} meshes, ${stats.vertices} verts, ${stats.faces} tris`,
    ];

    const lightNodes = this.scene.lightNodes();
    if (lightNodes.length === 0) {
      lines.push('No lights in scene.');
    } else {
      lines.push('Lights:');
      lightNodes.forEach((node, i) => {
        if (node.light) {
          lines.push(` ${i}: ${node.name} ${describeLight(node.light)}`);
        }
      });
    }

    return lines;
  }

  logSummary(): void {
    const stats = this.scene.getStats();
    logInfo(
      `Scene ready: ${stats.nodes} nodes, ${stats.meshNodes} meshes, ${stats.lightNodes} lights, ` +
      `${this.renderer.getPixelWidth()}x${this.renderer.getPixelHeight()} pixels`
    );
  }
}
