import { Vector3 } from './math/Vector3.js';
import { Matrix4 } from './math/Matrix4.js';
import { Camera } from './Camera.js';
import type { Mesh } from './Mesh.js';
import type { Scene } from './Scene.js';
import { Framebuffer } from './Framebuffer.js';
import { DepthBuffer } from './DepthBuffer.js';
import { Rasterizer, type ScreenVertex } from './Rasterizer.js';
import { prepareLight, COLOR_SCALE, type PreparedLight } from './Light.js';
import type { ScaledAmbient } from './Shading.js';
import { Color, CURSOR_HIDE, CURSOR_SHOW, ALT_SCREEN_ON, ALT_SCREEN_OFF, RESET } from '../utils/Colors.js';
import { logDebug, logWarn } from '../utils/Log.js';

// Slack around the unit NDC cube before a mesh counts as off-screen
export const CULL_MARGIN = 0.2;

export interface RenderStats {
  meshesDrawn: number;
  meshesCulled: number;
  triangles: number;
  vertices: number;
  frameTime: number;
}

export class Renderer {
  private framebuffer: Framebuffer;
  private depthBuffer: DepthBuffer;
  private rasterizer: Rasterizer;

  private charWidth: number;
  private charHeight: number;
  private resolutionFactor: number = 1;
  private pixelWidth: number = 0;
  private pixelHeight: number = 0;

  private ambientLight: Color = new Color(50, 50, 60);

  // Requests made while a frame is in progress wait for the next one
  private inFrame: boolean = false;
  private pendingSize: { width: number; height: number } | null = null;
  private pendingFactor: number | null = null;

  private lastStats: RenderStats = {
    meshesDrawn: 0,
    meshesCulled: 0,
    triangles: 0,
    vertices: 0,
    frameTime: 0
  };

  constructor(charWidth: number, charHeight: number, resolutionFactor: number = 1) {
    this.charWidth = Math.max(1, Math.floor(charWidth));
    this.charHeight = Math.max(1, Math.floor(charHeight));
    this.framebuffer = new Framebuffer(0, 0);
    this.depthBuffer = new DepthBuffer(0, 0);
    this.rasterizer = new Rasterizer(this.framebuffer, this.depthBuffer);
    this.applyResolution(resolutionFactor);
  }

  getCharWidth(): number {
    return this.charWidth;
  }

  getCharHeight(): number {
    return this.charHeight;
  }

  getPixelWidth(): number {
    return this.pixelWidth;
  }

  getPixelHeight(): number {
    return this.pixelHeight;
  }

  getResolutionFactor(): number {
    return this.resolutionFactor;
  }

  getFramebuffer(): Framebuffer {
    return this.framebuffer;
  }

  getDepthBuffer(): DepthBuffer {
    return this.depthBuffer;
  }

  getLastStats(): RenderStats {
    return { ...this.lastStats };
  }

  isInFrame(): boolean {
    return this.inFrame;
  }

  setClearColor(color: Color): void {
    this.framebuffer.setClearColor(color.clamped());
  }

  getClearColor(): Color {
    return this.framebuffer.getClearColor();
  }

  setAmbientLight(color: Color): void {
    this.ambientLight = color.clamped();
  }

  getAmbientLight(): Color {
    return this.ambientLight.clone();
  }

  /**
   * Supersampling factor: the pixel buffer is floor(charWidth * f) wide and
   * floor(charHeight * f) * 2 tall.
   */
  setResolutionFactor(factor: number): void {
    if (this.inFrame) {
      this.pendingFactor = factor;
      return;
    }
    this.applyResolution(factor);
  }

  resize(charWidth: number, charHeight: number): void {
    const width = Math.max(1, Math.floor(charWidth));
    const height = Math.max(1, Math.floor(charHeight));
    if (this.inFrame) {
      this.pendingSize = { width, height };
      return;
    }
    this.charWidth = width;
    this.charHeight = height;
    this.applyResolution(this.resolutionFactor);
  }

  private isUsableFactor(factor: number): boolean {
    return Number.isFinite(factor) &&
      factor > 0 &&
      Math.floor(this.charWidth * factor) >= 1 &&
      Math.floor(this.charHeight * factor) >= 1;
  }

  private applyResolution(factor: number): void {
    let f = factor;
    if (!this.isUsableFactor(f)) {
      logWarn(`Invalid resolution factor ${factor}, using 1`);
      f = 1;
    }

    this.resolutionFactor = f;
    this.pixelWidth = Math.floor(this.charWidth * f);
    this.pixelHeight = Math.floor(this.charHeight * f) * 2;
    this.framebuffer.resize(this.pixelWidth, this.pixelHeight);
    this.depthBuffer.resize(this.pixelWidth, this.pixelHeight);
  }

  private applyPending(): void {
    if (!this.pendingSize && this.pendingFactor === null) {
      return;
    }
    const size = this.pendingSize ?? { width: this.charWidth, height: this.charHeight };
    const factor = this.pendingFactor ?? this.resolutionFactor;
    this.pendingSize = null;
    this.pendingFactor = null;

    logDebug(`Applying deferred resize to ${size.width}x${size.height} at factor ${factor}`);
    this.charWidth = size.width;
    this.charHeight = size.height;
    this.applyResolution(factor);
  }

  getAspect(): number {
    return this.pixelWidth / this.pixelHeight;
  }

  clear(): void {
    this.framebuffer.clear();
    this.depthBuffer.clear();
  }

  /**
   * Bounding-box test against the view volume. Corners are projected with
   * the perspective divide. NDC x and y must reach into [-1.2, 1.2], and
   * NDC z into the camera's near..far values widened by the same margin.
   */
  isMeshVisible(mesh: Mesh, world: Matrix4, viewProjection: Matrix4, camera: Camera): boolean {
    if (mesh.vertexCount === 0) {
      return false;
    }

    let minX = Infinity, minY = Infinity, minZ = Infinity;
    let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;

    for (const corner of mesh.getBoundsCorners()) {
      const p = viewProjection.transformPoint(world.transformPoint(corner));
      minX = Math.min(minX, p.x);
      minY = Math.min(minY, p.y);
      minZ = Math.min(minZ, p.z);
      maxX = Math.max(maxX, p.x);
      maxY = Math.max(maxY, p.y);
      maxZ = Math.max(maxZ, p.z);
    }

    const limit = 1 + CULL_MARGIN;
    if (maxX < -limit || minX > limit) return false;
    if (maxY < -limit || minY > limit) return false;
    if (maxZ < camera.near - CULL_MARGIN || minZ > camera.far + CULL_MARGIN) return false;
    return true;
  }

  /**
   * View-space depth is offset by the camera zoom; vertices that end up at or
   * behind the near plane get z = Infinity.
   */
  projectVertices(
    worldVertices: readonly Vector3[],
    view: Matrix4,
    projection: Matrix4,
    camera: Camera
  ): ScreenVertex[] {
    const out: ScreenVertex[] = new Array(worldVertices.length);
    const wMax = this.pixelWidth - 1;
    const hMax = this.pixelHeight - 1;

    for (let i = 0; i < worldVertices.length; i++) {
      const v = view.transformPoint(worldVertices[i]);
      const z = v.z + camera.zoom;

      if (z <= camera.near) {
        out[i] = { x: 0, y: 0, z: Infinity };
        continue;
      }

      const ndc = projection.transformPoint(new Vector3(v.x, v.y, z));
      out[i] = {
        x: Math.trunc((ndc.x * 0.5 + 0.5) * wMax),
        y: Math.trunc((-ndc.y * 0.5 + 0.5) * hMax),
        z
      };
    }

    return out;
  }

  private scaledAmbient(): ScaledAmbient {
    return {
      r: this.ambientLight.r * COLOR_SCALE,
      g: this.ambientLight.g * COLOR_SCALE,
      b: this.ambientLight.b * COLOR_SCALE
    };
  }

  // Lights of every visible node, moved into world space
  collectLights(scene: Scene): PreparedLight[] {
    const lights: PreparedLight[] = [];
    scene.traverse(node => {
      if (!node.visible) return false;
      if (node.light) {
        lights.push(prepareLight(node.light, node.worldMatrix()));
      }
      return true;
    });
    return lights;
  }

  /**
   * Draw a single mesh into the current buffers. Returns false when the mesh
   * was culled.
   */
  renderMesh(
    mesh: Mesh,
    world: Matrix4,
    camera: Camera,
    lights: readonly PreparedLight[]
  ): boolean {
    const view = camera.getViewMatrix();
    const projection = camera.getProjectionMatrix(this.getAspect());
    const viewProjection = projection.multiply(view);

    if (!this.isMeshVisible(mesh, world, viewProjection, camera)) {
      return false;
    }

    const worldVertices = mesh.vertices.map(v => world.transformPoint(v));
    const screen = this.projectVertices(worldVertices, view, projection, camera);

    this.rasterizer.setLighting(this.scaledAmbient(), lights);
    this.rasterizer.rasterizeMesh(mesh, worldVertices, screen);
    return true;
  }

  /**
   * Clear, then draw every visible mesh node depth-first. An invisible node
   * hides its whole subtree.
   */
  render(scene: Scene, camera: Camera): RenderStats {
    const startTime = performance.now();
    this.applyPending();
    this.inFrame = true;

    const stats: RenderStats = {
      meshesDrawn: 0,
      meshesCulled: 0,
      triangles: 0,
      vertices: 0,
      frameTime: 0
    };

    try {
      this.clear();
      const lights = this.collectLights(scene);

      scene.traverse(node => {
        if (!node.visible) return false;
        const mesh = node.mesh;
        if (mesh) {
          if (this.renderMesh(mesh, node.worldMatrix(), camera, lights)) {
            stats.meshesDrawn++;
            stats.triangles += mesh.faceCount;
            stats.vertices += mesh.vertexCount;
          } else {
            stats.meshesCulled++;
          }
        }
        return true;
      });
    } finally {
      this.inFrame = false;
    }

    stats.frameTime = performance.now() - startTime;
    this.lastStats = stats;
    return stats;
  }

  // Half-block lines for the current pixel buffer
  compose(): string[] {
    return this.framebuffer.toHalfBlockLines(this.charWidth, this.charHeight, this.resolutionFactor);
  }

  renderAndComposite(scene: Scene, camera: Camera): string[] {
    this.render(scene, camera);
    return this.compose();
  }

  // Enter fullscreen mode (alternate screen, hidden cursor)
  static enterFullscreen(): void {
    process.stdout.write(ALT_SCREEN_ON + CURSOR_HIDE);
  }

  // Exit fullscreen mode
  static exitFullscreen(): void {
    process.stdout.write(CURSOR_SHOW + ALT_SCREEN_OFF + RESET);
  }
}
