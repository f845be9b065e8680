/**
 * Ordered sprite collection
 * 有序精灵集合
 *
 * A list references sprites it does not own; one sprite may sit in several
 * lists. Appending registers the list on the sprite (as a weak reference keyed
 * by list id) so Sprite.kill() can take the sprite out of every list.
 * 列表引用但不拥有精灵，一个精灵可以同时位于多个列表中。
 * 追加时会在精灵上登记该列表（以列表ID为键的弱引用），
 * 以便 Sprite.kill() 将精灵从所有列表中移除。
 *
 * @example
 * ```typescript
 * const meteors = new SpriteList();
 * for (let i = 0; i < 100; i++) {
 *   const meteor = new Sprite('images/meteor.png', 0.25);
 *   meteor.setPosition(Math.random() * 800, Math.random() * 600);
 *   meteors.append(meteor);
 * }
 * meteors.update();
 * meteors.draw();
 * ```
 */

import { EmptyCollectionError, NotFoundError } from '../errors/SpriteErrors';
import type { Sprite } from './Sprite';
import type { SpriteContainer } from './types';

let nextListId = 1;

export class SpriteList<T extends Sprite = Sprite> implements SpriteContainer, Iterable<T> {
  readonly id: number;
  private readonly _sprites: T[] = [];

  constructor() {
    this.id = nextListId++;
  }

  /**
   * Number of entries
   * 条目数量
   */
  get length(): number {
    return this._sprites.length;
  }

  /**
   * Add a sprite to the end of the list. Duplicates are not rejected.
   * 将精灵添加到列表末尾，不检查重复。
   */
  append(sprite: T): void {
    this._sprites.push(sprite);
    sprite.registerSpriteList(this);
  }

  /**
   * Remove the first entry of a sprite
   * 移除精灵的第一个条目
   *
   * @throws NotFoundError when the sprite is not in the list
   */
  remove(sprite: T): void {
    const index = this._sprites.indexOf(sprite);
    if (index === -1) {
      throw new NotFoundError('Sprite is not in this list', { listId: this.id });
    }
    this._sprites.splice(index, 1);
    this.releaseIfAbsent(sprite);
  }

  /**
   * Remove and return the last sprite
   * 移除并返回最后一个精灵
   *
   * @throws EmptyCollectionError when the list is empty
   */
  pop(): T {
    const sprite = this._sprites.pop();
    if (sprite === undefined) {
      throw new EmptyCollectionError('Cannot pop from an empty sprite list', { listId: this.id });
    }
    this.releaseIfAbsent(sprite);
    return sprite;
  }

  includes(sprite: T): boolean {
    return this._sprites.includes(sprite);
  }

  /**
   * Entry at index; negative indices count from the end
   * 指定索引处的条目，负索引从末尾计数
   */
  at(index: number): T | undefined {
    return this._sprites.at(index);
  }

  /**
   * Remove every entry and drop each sprite's reference to this list
   * 移除所有条目并解除每个精灵对该列表的引用
   */
  clear(): void {
    const sprites = this._sprites.splice(0, this._sprites.length);
    for (const sprite of sprites) {
      sprite.unregisterSpriteList(this);
    }
  }

  /**
   * Call update() on each sprite in order
   * 依次调用每个精灵的 update()
   */
  update(): void {
    for (const sprite of this._sprites) {
      sprite.update();
    }
  }

  /**
   * Call draw() on each sprite in order
   * 依次调用每个精灵的 draw()
   */
  draw(): void {
    for (const sprite of this._sprites) {
      sprite.draw();
    }
  }

  /**
   * Iterate the current entries in order. The iterator reads the live list:
   * appending or removing while iterating has unspecified results.
   * 按顺序迭代当前条目。迭代器读取的是实时列表：
   * 迭代过程中追加或移除条目的结果不确定。
   */
  [Symbol.iterator](): Iterator<T> {
    return this._sprites[Symbol.iterator]();
  }

  private releaseIfAbsent(sprite: T): void {
    if (!this._sprites.includes(sprite)) {
      sprite.unregisterSpriteList(this);
    }
  }
}
