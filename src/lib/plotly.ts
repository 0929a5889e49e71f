import Plotly from "plotly.js-dist-min";
import createPlotlyComponent from "react-plotly.js/factory";

// Bound to the minified bundle so the full plotly.js build is never pulled in.
export const Plot = createPlotlyComponent(Plotly);
