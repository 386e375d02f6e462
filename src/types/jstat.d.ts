declare module "jstat" {
  interface JStatStatic {
    centralF: {
      cdf(x: number, df1: number, df2: number): number;
      inv(p: number, df1: number, df2: number): number;
    };
    normal: {
      cdf(x: number, mean: number, std: number): number;
      inv(p: number, mean: number, std: number): number;
    };
  }

  const jStat: JStatStatic;

  export = jStat;
}
