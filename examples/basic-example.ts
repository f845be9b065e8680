import {
  Sprite,
  SpriteList,
  TurningSprite,
  createTexture,
  setRenderBackend,
  setTextureLoader,
} from '../src';
import type { IRenderBackend, ITextureLoader, Texture } from '../src';

// Loader that hands out fixed-size textures
const loader: ITextureLoader = {
  loadTexture(path: string, x: number, y: number, width: number, height: number): Texture {
    return width === 0 && height === 0
      ? createTexture(path, 64, 64)
      : createTexture(`${path}#${x},${y}`, width, height);
  },
};

// Backend that prints each draw call
const backend: IRenderBackend = {
  drawTexturedRect(centerX, centerY, width, height, texture, angle) {
    console.log(
      `draw ${texture.id} at (${centerX.toFixed(1)}, ${centerY.toFixed(1)}) ` +
      `${width}x${height} angle ${angle.toFixed(1)}`
    );
  },
};

setTextureLoader(loader);
setRenderBackend(backend);

const meteors = new SpriteList();
for (let i = 0; i < 3; i++) {
  const meteor = new Sprite('images/meteor.png', 0.5);
  meteor.setPosition(i * 40, 100);
  meteor.changeY = -5;
  meteor.changeAngle = 15;
  meteors.append(meteor);
}

const bullets = new SpriteList<TurningSprite>();
const bullet = new TurningSprite('images/bullet.png', 0.25);
bullet.changeX = 3;
bullet.changeY = 3;
bullets.append(bullet);

for (let frame = 0; frame < 20; frame++) {
  meteors.update();
  bullets.update();

  for (const meteor of [...meteors]) {
    if (meteor.bottom < 0) {
      meteor.kill();
    }
  }

  meteors.draw();
  bullets.draw();
}

console.log(`meteors left: ${meteors.length}`);
