import figlet from "figlet";
import { logger } from "./logger.js";

/**
 * Generate ASCII art text for the CLI header
 * @param msg - Message to convert to ASCII art
 */
export const getAsciiArt = (msg: string): string => {
  try {
    return figlet.textSync(msg, {
      font: "Standard",
      horizontalLayout: "default",
      verticalLayout: "default",
      width: 80,
      whitespaceBreak: true,
    });
  } catch (error) {
    logger.warn("Warning: Font rendering failed, printing plain header", error);
    return msg;
  }
};
