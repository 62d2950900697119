import fs from "node:fs";
import path from "node:path";
import type { ImageSource } from "./config.js";
import { describeError } from "./errors.js";
import type { HttpHandler } from "./host.js";
import type { Logger } from "./logger.js";

const IMAGE_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".webp": "image/webp",
};

export type DecorativeImage = {
  name: string;
  path: string;
  contentType: string;
};

/**
 * Registers every picture that can be served and skips the rest. Problems
 * are logged, never thrown: the forms work with or without pictures.
 */
export function loadDecorativeImages(
  sources: readonly ImageSource[],
  logger: Logger,
): DecorativeImage[] {
  const images: DecorativeImage[] = [];

  for (const source of sources) {
    const contentType = IMAGE_TYPES[path.extname(source.path).toLowerCase()];
    if (!contentType) {
      logger.warn(`Error loading ${source.name} image: unsupported file type: ${source.path}`);
      continue;
    }

    try {
      if (!fs.statSync(source.path).isFile()) {
        logger.warn(`Error loading ${source.name} image: not a file: ${source.path}`);
        continue;
      }
      fs.accessSync(source.path, fs.constants.R_OK);
    } catch (err) {
      logger.warn(`Error loading ${source.name} image: ${describeError(err)}`);
      continue;
    }

    images.push({ name: source.name, path: source.path, contentType });
  }

  return images;
}

export function createAssetHandler(images: readonly DecorativeImage[], logger: Logger): HttpHandler {
  return async (req, res) => {
    const url = new URL(req.url ?? "/", "http://localhost");
    const match = url.pathname.match(/^\/assets\/([^/]+)$/);
    if (!match || req.method !== "GET") {
      return false;
    }

    const image = images.find((candidate) => candidate.name === match[1]);
    if (!image) {
      res.statusCode = 404;
      res.end("Not Found");
      return true;
    }

    let data: Buffer;
    try {
      data = fs.readFileSync(image.path);
    } catch (err) {
      logger.warn(`Error loading ${image.name} image: ${describeError(err)}`);
      res.statusCode = 404;
      res.end("Not Found");
      return true;
    }

    res.setHeader("Content-Type", image.contentType);
    res.end(data);
    return true;
  };
}
