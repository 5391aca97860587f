import * as Ownership from '../lib/src/index'

// A texture is expensive to load and must be released explicitly. The cache
// hands out shared owners and only remembers textures weakly, so a texture is
// unloaded as soon as the last user drops it.

class Texture implements Ownership.Disposable {
  constructor(public readonly path: string) {
    console.log(`loading ${path}`)
  }

  dispose() {
    console.log(`unloading ${this.path}`)
  }
}

class TextureCache {
  private readonly entries = new Map<string, Ownership.WeakObserver<Texture>>()

  acquire(path: string): Ownership.SharedOwner<Texture> {
    const cached = this.entries.get(path)?.lock()
    if (cached !== undefined && !cached.isEmpty()) {
      return cached
    }
    const texture = new Ownership.SharedOwner(new Texture(path))
    this.entries.get(path)?.dispose()
    this.entries.set(path, new Ownership.WeakObserver(texture))
    return texture
  }

  prune() {
    for (const [path, observer] of this.entries) {
      if (observer.expired()) {
        observer.dispose()
        this.entries.delete(path)
      }
    }
  }
}

const cache = new TextureCache()
const hero = cache.acquire('hero.png')
const heroAgain = cache.acquire('hero.png')
console.log(`hero users: ${heroAgain.useCount()}`)

hero.dispose()
heroAgain.dispose()
cache.prune()

const background = new Ownership.ExclusiveOwner(new Texture('background.png'))
background.dispose()
