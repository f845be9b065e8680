/**
 * Render Context
 * 渲染上下文
 *
 * Holds the render backend and texture loader that sprites draw and load
 * through. A process-wide instance is exported for sprites to use.
 * 保存精灵用于绘制和加载的渲染后端与纹理加载器。
 * 导出一个进程级实例供精灵使用。
 */

import type { IRenderBackend, ITextureLoader } from './IRenderBackend';
import type { Texture } from '../resources/Texture';
import { RenderError, TextureIOError } from '../errors/SpriteErrors';

export class RenderContext {
  private _backend: IRenderBackend | null = null;
  private _loader: ITextureLoader | null = null;

  /**
   * Register the render backend
   * 注册渲染后端
   */
  setBackend(backend: IRenderBackend): void {
    if (this._backend !== null && this._backend !== backend) {
      console.warn('[RenderContext] Replacing active render backend');
    }
    this._backend = backend;
  }

  /**
   * Get the render backend
   * 获取渲染后端
   *
   * @throws RenderError when no backend is registered
   */
  getBackend(): IRenderBackend {
    if (this._backend === null) {
      throw new RenderError('No render backend registered');
    }
    return this._backend;
  }

  hasBackend(): boolean {
    return this._backend !== null;
  }

  /**
   * Register the texture loader
   * 注册纹理加载器
   */
  setLoader(loader: ITextureLoader): void {
    if (this._loader !== null && this._loader !== loader) {
      console.warn('[RenderContext] Replacing active texture loader');
    }
    this._loader = loader;
  }

  /**
   * Get the texture loader
   * 获取纹理加载器
   *
   * @throws TextureIOError when no loader is registered
   */
  getLoader(): ITextureLoader {
    if (this._loader === null) {
      throw new TextureIOError('No texture loader registered');
    }
    return this._loader;
  }

  /**
   * Load a texture region through the registered loader
   * 通过已注册的加载器加载纹理区域
   */
  loadTexture(path: string, x = 0, y = 0, width = 0, height = 0): Texture {
    return this.getLoader().loadTexture(path, x, y, width, height);
  }

  /**
   * Drop the backend and loader
   * 移除后端和加载器
   */
  reset(): void {
    this._backend = null;
    this._loader = null;
  }
}

/**
 * Global render context used by sprites
 * 精灵使用的全局渲染上下文
 */
export const renderContext = new RenderContext();

/**
 * Register the render backend on the global context
 * 在全局上下文中注册渲染后端
 */
export function setRenderBackend(backend: IRenderBackend): void {
  renderContext.setBackend(backend);
}

/**
 * Register the texture loader on the global context
 * 在全局上下文中注册纹理加载器
 */
export function setTextureLoader(loader: ITextureLoader): void {
  renderContext.setLoader(loader);
}

/**
 * Load a texture through the global context
 * 通过全局上下文加载纹理
 */
export function loadTexture(path: string, x = 0, y = 0, width = 0, height = 0): Texture {
  return renderContext.loadTexture(path, x, y, width, height);
}
