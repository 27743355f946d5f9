import chalk from "chalk";

// 固定 16 色输出，不随终端能力检测变化
const palette = new chalk.Instance({ level: 1 });

// chalk 输出成对的开闭码；这里只取开始码，每段统一以 reset 结束
function openCodes(style: chalk.Chalk): string {
  const styled = style("x");
  return styled.slice(0, styled.indexOf("x"));
}

const LABEL = openCodes(palette.cyanBright.bold);
const VALUE = openCodes(palette.white);
const RESET = openCodes(palette.reset);

/**
 * 彩色的 "标签: 值" 行
 */
export function prettyLine(label: string, value: string): string {
  return `${prettyHeading(`${label}: `)}${VALUE}${value}${RESET}\n`;
}

/**
 * 彩色标题，不带值
 */
export function prettyHeading(text: string): string {
  return `${LABEL}${text}${RESET}`;
}

export function plainLine(label: string, value: string): string {
  return `${label}: ${value}\n`;
}
