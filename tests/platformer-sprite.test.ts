/**
 * Platformer sprite movement and frame selection tests
 * 平台跳跃精灵移动与帧选择测试
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { PlatformerSprite } from '../src/sprites/PlatformerSprite';
import { PlatformerConfig, createPlatformerConfig } from '../src/resources/PlatformerConfig';
import { createTexture } from '../src/resources/Texture';
import { IndexOutOfRangeError } from '../src/errors/SpriteErrors';

// Frames: 0-2 walk right, 3-4 walk left, 5 jump right, 6 jump left
function makePlayer(config: Partial<PlatformerConfig> = { speed: 2, textureChangeDistance: 3 }): PlatformerSprite {
  const player = new PlatformerSprite(undefined, 1, config);
  for (let i = 0; i < 7; i++) {
    player.appendTexture(createTexture(`frame${i}`, 10 + i, 20));
  }
  player.setRightWalkTextures([0, 1, 2]);
  player.setLeftWalkTextures([3, 4]);
  player.setRightStandTextures([0]);
  player.setLeftStandTextures([3]);
  player.setRightJumpTextures([5]);
  player.setLeftJumpTextures([6]);
  return player;
}

describe('PlatformerConfig', () => {
  test('should provide defaults', () => {
    const config = new PlatformerConfig();

    expect(config.speed).toBe(0.003);
    expect(config.jumpSpeed).toBe(0.01);
    expect(config.textureChangeDistance).toBe(0);
  });

  test('should apply overrides', () => {
    const config = createPlatformerConfig({ speed: 4 });

    expect(config.speed).toBe(4);
    expect(config.jumpSpeed).toBe(0.01);
  });

  test('should keep defaults for overrides left undefined', () => {
    const config = createPlatformerConfig({ speed: undefined, jumpSpeed: 3 });

    expect(config.speed).toBe(0.003);
    expect(config.jumpSpeed).toBe(3);
    expect(config.textureChangeDistance).toBe(0);
  });

  test('should move at the default speed when the speed override is undefined', () => {
    const player = new PlatformerSprite(undefined, 1, { speed: undefined });
    player.goRight();

    expect(player.changeX).toBe(0.003);
  });
});

describe('PlatformerSprite', () => {
  let player: PlatformerSprite;

  beforeEach(() => {
    player = makePlayer();
  });

  test('should start facing right with the configured tuning', () => {
    expect(player.kind).toBe('platformer');
    expect(player.facing).toBe('right');
    expect(player.lastSwapX).toBe(0);
    expect(player.config.speed).toBe(2);
    expect(player.getFrameTable('rightWalk')).toEqual([0, 1, 2]);
  });

  test('should keep up and down walk and stand tables', () => {
    player.setUpWalkTextures([1, 2]);
    player.setDownWalkTextures([4]);
    player.setUpStandTextures([5]);
    player.setDownStandTextures([6]);

    expect(player.getFrameTable('upWalk')).toEqual([1, 2]);
    expect(player.getFrameTable('downWalk')).toEqual([4]);
    expect(player.getFrameTable('upStand')).toEqual([5]);
    expect(player.getFrameTable('downStand')).toEqual([6]);
  });

  test('should not select from the up and down tables on update', () => {
    player.setUpStandTextures([5]);
    player.setDownStandTextures([6]);

    player.update();

    expect(player.currentTextureIndex).toBe(0);
  });

  test('should copy frame tables', () => {
    const indices = [0, 1];
    player.setFrameTable('rightWalk', indices);
    indices.push(2);

    expect(player.getFrameTable('rightWalk')).toEqual([0, 1]);
  });

  describe('movement commands', () => {
    test('should start moving right at the configured speed', () => {
      player.goRight();

      expect(player.changeX).toBe(2);
    });

    test('should not change speed when already moving right', () => {
      player.changeX = 5;
      player.goRight();

      expect(player.changeX).toBe(5);
    });

    test('should reverse leftward motion on goRight', () => {
      player.changeX = -2;
      player.goRight();

      expect(player.changeX).toBe(2);
    });

    test('should start moving left at the configured speed', () => {
      player.goLeft();

      expect(player.changeX).toBe(-2);
    });

    test('should not change speed when already moving left', () => {
      player.changeX = -7;
      player.goLeft();

      expect(player.changeX).toBe(-7);
    });

    test('should stop only the matching direction', () => {
      player.changeX = -2;
      player.stopRight();
      expect(player.changeX).toBe(-2);

      player.stopLeft();
      expect(player.changeX).toBe(0);

      player.changeX = 2;
      player.stopLeft();
      expect(player.changeX).toBe(2);

      player.stopRight();
      expect(player.changeX).toBe(0);
    });

    test('should change facing', () => {
      player.faceLeft();
      expect(player.facing).toBe('left');

      player.faceRight();
      expect(player.facing).toBe('right');
    });

    test('should jump at the configured jump speed', () => {
      const jumper = makePlayer({ jumpSpeed: 6 });
      jumper.jump();

      expect(jumper.changeY).toBe(6);
    });
  });

  describe('frame selection', () => {
    test('should advance walk frames after travelling far enough', () => {
      player.goRight();

      player.update();
      expect(player.centerX).toBe(2);
      expect(player.currentTextureIndex).toBe(0);

      player.update();
      expect(player.currentTextureIndex).toBe(1);
      expect(player.lastSwapX).toBe(4);

      player.update();
      expect(player.currentTextureIndex).toBe(1);

      player.update();
      expect(player.currentTextureIndex).toBe(2);

      player.update();
      player.update();
      expect(player.currentTextureIndex).toBe(0);
      expect(player.lastSwapX).toBe(12);
    });

    test('should resize to the selected frame', () => {
      player.goRight();
      player.update();
      player.update();

      expect(player.width).toBe(11);
      expect(player.height).toBe(20);
    });

    test('should start the left walk cycle from its first frame', () => {
      player.goLeft();

      player.update();
      expect(player.currentTextureIndex).toBe(0);

      player.update();
      expect(player.centerX).toBe(-4);
      expect(player.currentTextureIndex).toBe(3);

      player.update();
      player.update();
      expect(player.currentTextureIndex).toBe(4);

      player.update();
      player.update();
      expect(player.currentTextureIndex).toBe(3);
    });

    test('should swap every update with a zero change distance', () => {
      const runner = makePlayer({ speed: 1, textureChangeDistance: 0 });
      runner.goRight();

      runner.update();
      expect(runner.currentTextureIndex).toBe(1);

      runner.update();
      expect(runner.currentTextureIndex).toBe(2);
    });

    test('should show the stand frame for the facing direction when still', () => {
      player.setTexture(2);
      player.update();
      expect(player.currentTextureIndex).toBe(0);

      player.faceLeft();
      player.update();
      expect(player.currentTextureIndex).toBe(3);
    });

    test('should show the jump frame for the facing direction in the air', () => {
      player.jump();
      player.update();
      expect(player.currentTextureIndex).toBe(5);
      expect(player.centerY).toBe(0.01);

      player.faceLeft();
      player.goRight();
      player.update();
      expect(player.currentTextureIndex).toBe(6);
    });

    test('should fail on a table entry outside the frame list', () => {
      player.setRightStandTextures([9]);

      expect(() => player.update()).toThrow(IndexOutOfRangeError);
      expect(player.currentTextureIndex).toBe(0);
    });

    test('should undo the move when a walk entry is outside the frame list', () => {
      const runner = makePlayer({ speed: 2, textureChangeDistance: 0 });
      runner.setRightWalkTextures([9]);
      runner.changeAngle = 5;
      runner.goRight();

      expect(() => runner.update()).toThrow(IndexOutOfRangeError);
      expect(runner.centerX).toBe(0);
      expect(runner.angle).toBe(0);
      expect(runner.lastSwapX).toBe(0);
      expect(runner.currentTextureIndex).toBe(0);
    });

    test('should undo the move when a jump entry is outside the frame list', () => {
      player.setRightJumpTextures([9]);
      player.jump();

      expect(() => player.update()).toThrow(IndexOutOfRangeError);
      expect(player.centerY).toBe(0);
      expect(player.changeY).toBe(0.01);
    });
  });

  describe('missing frame tables', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    test('should keep the current frame and warn once', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const bare = new PlatformerSprite(createTexture('idle', 8, 8), 1);

      bare.update();
      bare.update();

      expect(bare.currentTextureIndex).toBe(0);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        "[PlatformerSprite] No frames configured for 'rightStand', keeping current frame"
      );
    });

    test('should warn again after the table is replaced with an empty one', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const bare = new PlatformerSprite(createTexture('idle', 8, 8), 1);

      bare.update();
      bare.setRightStandTextures([]);
      bare.update();

      expect(warn).toHaveBeenCalledTimes(2);
    });
  });
});
