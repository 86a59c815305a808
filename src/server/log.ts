export type LogFn = (area: string, msg: string, data?: unknown) => void;

/** Timestamped, component-prefixed console logger: `[12:34:56.789] [Engine:offer] ...` */
export function createLog(component: string): LogFn {
  return (area, msg, data) => {
    const ts = new Date().toISOString().slice(11, 23);
    const prefix = `[${ts}] [${component}:${area}]`;
    if (data !== undefined) {
      console.log(prefix, msg, typeof data === "string" ? data.slice(0, 200) : data);
    } else {
      console.log(prefix, msg);
    }
  };
}
