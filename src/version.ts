/** 产品名，用于默认 User-Agent */
export const PRODUCT_NAME = "IgnitionFuelTools";

export const VERSION = "1.0.0";
