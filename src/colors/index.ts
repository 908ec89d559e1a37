export { parseColorGuide, parseLegoColorDetails, parseSwatchHex } from "./colorGuide";
export { ColorGuideService } from "./service";
