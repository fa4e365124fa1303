import {
  Document,
  Line,
  Page,
  Polyline,
  StyleSheet,
  Svg,
  Text,
  View,
  renderToBuffer,
} from '@react-pdf/renderer';
import type { VerdictTone } from '@/scoring/comparator';

export type NarrativeBlock = { kind: 'heading' | 'bullet' | 'text'; text: string };

/** A labelled block (overview, financial health, analysts) that may be unavailable. */
export interface PanelData {
  available: boolean;
  note: string | null;
  entries: Array<{ label: string; value: string }>;
  text: string | null;
}

export type ChartData =
  | { available: false; note: string }
  | {
      available: true;
      width: number;
      height: number;
      /** Polyline coordinates: "x,y x,y ..." */
      close: string;
      shortAverage: string;
      longAverage: string;
      shortLabel: string;
      longLabel: string;
      caption: string;
    };

export interface StockPageDocumentData {
  stockId: string;
  companyName: string | null;
  generatedAt: string;
  priceLabel: string;
  marketAvailable: boolean;
  marketNote: string;
  figures: Array<{ label: string; value: string }>;
  overview: PanelData;
  health: PanelData;
  analyst: PanelData;
  chart: ChartData;
  rows: Array<{
    metricName: string;
    value: string;
    peerMean: string;
    peers: string;
    verdictLabel: string;
    tone: VerdictTone;
  }>;
  summaryLine: string;
  narrativeBlocks: NarrativeBlock[];
  narrativeSourceLabel: string;
}

const NAVY = '#1a1f36';
const BORDER = '#d1d5db';
const TEXT = '#111827';
const MUTED = '#6b7280';
const CLOSE_LINE = '#1d4ed8';
const SHORT_LINE = '#ea580c';
const LONG_LINE = '#dc2626';

export const TONE_COLORS: Record<VerdictTone, { background: string; text: string }> = {
  favorable: { background: '#dcfce7', text: '#166534' },
  unfavorable: { background: '#fee2e2', text: '#991b1b' },
  undetermined: { background: '#f3f4f6', text: '#4b5563' },
};

const styles = StyleSheet.create({
  page: {
    paddingTop: 30,
    paddingBottom: 40,
    paddingHorizontal: 30,
    fontSize: 10,
    color: TEXT,
    fontFamily: 'Helvetica',
    lineHeight: 1.3,
  },
  pageTitle: {
    fontSize: 18,
    fontWeight: 700,
    color: NAVY,
    marginBottom: 2,
  },
  pageSubtitle: {
    fontSize: 10,
    color: MUTED,
    marginBottom: 10,
  },
  sectionHeader: {
    fontSize: 12,
    fontWeight: 700,
    color: NAVY,
    marginBottom: 6,
  },
  subHeader: {
    fontSize: 10,
    fontWeight: 700,
    color: NAVY,
    marginTop: 4,
    marginBottom: 2,
  },
  text: {
    fontSize: 9.5,
    color: TEXT,
  },
  label: {
    fontSize: 8.5,
    color: MUTED,
  },
  value: {
    fontSize: 11,
    fontWeight: 700,
    color: TEXT,
  },
  box: {
    borderWidth: 1,
    borderColor: BORDER,
    borderRadius: 6,
    padding: 10,
    marginTop: 8,
  },
  row: {
    flexDirection: 'row',
    alignItems: 'stretch',
  },
  figureGrid: {
    flexDirection: 'row',
    flexWrap: 'wrap',
    marginTop: 6,
  },
  figure: {
    width: '25%',
    paddingRight: 6,
    marginBottom: 4,
  },
  table: {
    borderWidth: 1,
    borderColor: BORDER,
    borderRadius: 4,
    overflow: 'hidden',
  },
  tableHead: {
    backgroundColor: NAVY,
    flexDirection: 'row',
  },
  tableHeadCell: {
    color: '#ffffff',
    fontSize: 8.5,
    fontWeight: 700,
    paddingVertical: 5,
    paddingHorizontal: 4,
  },
  tableBodyRow: {
    flexDirection: 'row',
    borderTopWidth: 1,
    borderTopColor: '#e5e7eb',
  },
  tableCell: {
    fontSize: 9,
    paddingVertical: 4.5,
    paddingHorizontal: 4,
  },
  bullet: {
    fontSize: 9.5,
    marginLeft: 8,
    marginBottom: 2,
  },
  panel: {
    flexGrow: 1,
    flexBasis: 0,
    marginHorizontal: 3,
    borderWidth: 1,
    borderColor: BORDER,
    borderRadius: 6,
    padding: 8,
  },
  panelRow: {
    flexDirection: 'row',
    justifyContent: 'space-between',
    marginBottom: 1.5,
  },
  legend: {
    flexDirection: 'row',
    marginTop: 4,
  },
  legendItem: {
    fontSize: 8,
    marginRight: 12,
  },
  footLeft: {
    position: 'absolute',
    left: 30,
    bottom: 16,
    fontSize: 8,
    color: MUTED,
  },
  footRight: {
    position: 'absolute',
    right: 30,
    bottom: 16,
    fontSize: 8,
    color: MUTED,
    textAlign: 'right',
  },
});

const COLUMNS = [
  { w: '30%', label: 'Metric' },
  { w: '17%', label: 'Stock' },
  { w: '17%', label: 'Peer avg' },
  { w: '11%', label: 'Peers' },
  { w: '25%', label: 'Verdict' },
];

function toneStyle(tone: VerdictTone) {
  const colors = TONE_COLORS[tone];
  return { backgroundColor: colors.background, color: colors.text, fontWeight: 700 };
}

function Footer({ generatedAt }: { generatedAt: string }) {
  return (
    <>
      <Text style={styles.footLeft} fixed>
        For educational use only. Not investment advice.
      </Text>
      <Text style={styles.footRight} fixed>
        {`Generated ${generatedAt}`}
      </Text>
    </>
  );
}

function MarketHeader({ data }: { data: StockPageDocumentData }) {
  return (
    <View style={styles.box}>
      <View style={[styles.row, { justifyContent: 'space-between' }]}>
        <View>
          <Text style={styles.label}>Last price</Text>
          <Text style={[styles.value, { fontSize: 16 }]}>{data.priceLabel}</Text>
        </View>
        <Text style={[styles.label, { maxWidth: '60%', textAlign: 'right' }]}>{data.marketNote}</Text>
      </View>
      {data.marketAvailable && data.figures.length > 0 ? (
        <View style={styles.figureGrid}>
          {data.figures.map((figure) => (
            <View key={figure.label} style={styles.figure}>
              <Text style={styles.label}>{figure.label}</Text>
              <Text style={styles.text}>{figure.value}</Text>
            </View>
          ))}
        </View>
      ) : null}
    </View>
  );
}

function Panel({ title, panel }: { title: string; panel: PanelData }) {
  return (
    <View style={styles.panel}>
      <Text style={[styles.sectionHeader, { fontSize: 10.5, marginBottom: 4 }]}>{title}</Text>
      {panel.available ? (
        <>
          {panel.entries.map((entry) => (
            <View key={entry.label} style={styles.panelRow}>
              <Text style={styles.label}>{entry.label}</Text>
              <Text style={[styles.text, { fontSize: 8.5, fontWeight: 700 }]}>{entry.value}</Text>
            </View>
          ))}
          {panel.text ? <Text style={[styles.text, { fontSize: 8, marginTop: 3 }]}>{panel.text}</Text> : null}
        </>
      ) : (
        <Text style={styles.label}>{panel.note}</Text>
      )}
    </View>
  );
}

function CompanyPanels({ data }: { data: StockPageDocumentData }) {
  return (
    <View style={[styles.row, { marginTop: 8, marginHorizontal: -3 }]}>
      <Panel title="Company Overview" panel={data.overview} />
      <Panel title="Financial Health" panel={data.health} />
      <Panel title="Analyst Insights" panel={data.analyst} />
    </View>
  );
}

function PriceChart({ chart }: { chart: ChartData }) {
  return (
    <View style={styles.box}>
      <Text style={styles.sectionHeader}>12-Month Price Trend</Text>
      {chart.available ? (
        <>
          <Svg width={chart.width} height={chart.height} viewBox={`0 0 ${chart.width} ${chart.height}`}>
            <Line x1={0} y1={chart.height} x2={chart.width} y2={chart.height} stroke={BORDER} strokeWidth={1} />
            <Polyline points={chart.close} stroke={CLOSE_LINE} strokeWidth={1.2} fill="none" />
            {chart.shortAverage ? (
              <Polyline points={chart.shortAverage} stroke={SHORT_LINE} strokeWidth={1} strokeDasharray="4,2" fill="none" />
            ) : null}
            {chart.longAverage ? (
              <Polyline points={chart.longAverage} stroke={LONG_LINE} strokeWidth={1} strokeDasharray="4,2" fill="none" />
            ) : null}
          </Svg>
          <View style={styles.legend}>
            <Text style={[styles.legendItem, { color: CLOSE_LINE }]}>Close</Text>
            <Text style={[styles.legendItem, { color: SHORT_LINE }]}>{chart.shortLabel}</Text>
            <Text style={[styles.legendItem, { color: LONG_LINE }]}>{chart.longLabel}</Text>
            <Text style={styles.label}>{chart.caption}</Text>
          </View>
        </>
      ) : (
        <Text style={styles.label}>{chart.note}</Text>
      )}
    </View>
  );
}

function MetricTable({ data }: { data: StockPageDocumentData }) {
  return (
    <View style={[styles.box, { padding: 0, borderWidth: 0 }]}>
      <Text style={styles.sectionHeader}>Key Metrics vs Peers</Text>
      <View style={styles.table}>
        <View style={styles.tableHead}>
          {COLUMNS.map((cell) => (
            <Text key={cell.label} style={[styles.tableHeadCell, { width: cell.w }]}>
              {cell.label}
            </Text>
          ))}
        </View>
        {data.rows.map((row) => (
          <View key={row.metricName} style={styles.tableBodyRow}>
            <Text style={[styles.tableCell, { width: COLUMNS[0].w }]}>{row.metricName}</Text>
            <Text style={[styles.tableCell, toneStyle(row.tone), { width: COLUMNS[1].w }]}>{row.value}</Text>
            <Text style={[styles.tableCell, { width: COLUMNS[2].w }]}>{row.peerMean}</Text>
            <Text style={[styles.tableCell, { width: COLUMNS[3].w }]}>{row.peers}</Text>
            <Text style={[styles.tableCell, { width: COLUMNS[4].w, color: TONE_COLORS[row.tone].text }]}>
              {row.verdictLabel}
            </Text>
          </View>
        ))}
      </View>
      <Text style={[styles.label, { marginTop: 4 }]}>{data.summaryLine}</Text>
    </View>
  );
}

function NarrativeSection({ data }: { data: StockPageDocumentData }) {
  return (
    <View style={styles.box}>
      <Text style={styles.sectionHeader}>Commentary</Text>
      {data.narrativeBlocks.map((block, index) => {
        if (block.kind === 'heading') {
          return (
            <Text key={`h-${index}`} style={styles.subHeader}>
              {block.text}
            </Text>
          );
        }
        if (block.kind === 'bullet') {
          return (
            <Text key={`b-${index}`} style={styles.bullet}>
              {`• ${block.text}`}
            </Text>
          );
        }
        return (
          <Text key={`t-${index}`} style={[styles.text, { marginBottom: 3 }]}>
            {block.text}
          </Text>
        );
      })}
      <Text style={[styles.label, { marginTop: 4 }]}>{data.narrativeSourceLabel}</Text>
    </View>
  );
}

export function StockPage({ data }: { data: StockPageDocumentData }) {
  return (
    <Page size="A4" style={styles.page}>
      <Text style={styles.pageTitle}>
        {data.companyName ? `${data.companyName} (${data.stockId})` : data.stockId}
      </Text>
      <Text style={styles.pageSubtitle}>One-page metric summary against the peer-group average</Text>
      <MarketHeader data={data} />
      <CompanyPanels data={data} />
      <PriceChart chart={data.chart} />
      <MetricTable data={data} />
      <NarrativeSection data={data} />
      <Footer generatedAt={data.generatedAt} />
    </Page>
  );
}

export function renderStockPage(data: StockPageDocumentData): Promise<Buffer> {
  return renderToBuffer(
    <Document title={`${data.stockId} One-Page Summary`} author="stock-one-pager">
      <StockPage data={data} />
    </Document>
  );
}
