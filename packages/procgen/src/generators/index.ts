export {
  createLevelPipeline,
  type GeneratedLevel,
  generateLevel,
  LevelGenerator,
} from "./level-generator";
