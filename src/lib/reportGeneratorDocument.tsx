import React from 'react';
import {
  Document,
  Page,
  StyleSheet,
  Text,
  View,
} from '@react-pdf/renderer';

export type RecommendationTone = 'good' | 'mid' | 'bad' | 'none';

export interface AnalysisSection {
  title: string | null;
  paragraphs: string[];
}

export interface AnalysisReportDocumentData {
  symbol: string;
  companyName: string;
  generatedAt: string;
  periodLabel: string;
  recommendation: string;
  recommendationTone: RecommendationTone;
  indicatorRows: Array<{ label: string; value: string }>;
  predictionLines: string[];
  sections: AnalysisSection[];
  newsStatsRows: Array<{ label: string; value: string }>;
}

const NAVY = '#1a1f36';
const TONE_GREEN = '#166534';
const TONE_YELLOW = '#854d0e';
const TONE_RED = '#991b1b';
const BORDER = '#d1d5db';
const TEXT = '#111827';
const MUTED = '#6b7280';

const styles = StyleSheet.create({
  page: {
    paddingTop: 34,
    paddingBottom: 42,
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
    marginBottom: 4,
  },
  pageSubtitle: {
    fontSize: 10,
    color: MUTED,
    marginBottom: 12,
  },
  block: {
    marginTop: 12,
  },
  sectionHeader: {
    fontSize: 12,
    fontWeight: 700,
    color: NAVY,
    marginBottom: 6,
  },
  text: {
    fontSize: 9.5,
    color: TEXT,
    marginBottom: 4,
  },
  label: {
    fontSize: 9,
    color: MUTED,
  },
  value: {
    fontSize: 22,
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
    justifyContent: 'space-between',
    marginBottom: 2,
  },
  toneGood: {
    color: TONE_GREEN,
  },
  toneMid: {
    color: TONE_YELLOW,
  },
  toneBad: {
    color: TONE_RED,
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

function toneStyle(tone: RecommendationTone) {
  if (tone === 'good') return styles.toneGood;
  if (tone === 'mid') return styles.toneMid;
  if (tone === 'bad') return styles.toneBad;
  return {};
}

function Footer({ generatedAt }: { generatedAt: string }) {
  return (
    <>
      <Text style={styles.footLeft} fixed>
        Stock Trend Advisor - AI-assisted stock analysis, not financial advice
      </Text>
      <Text
        style={styles.footRight}
        fixed
        render={({ pageNumber, totalPages }) =>
          `Page ${pageNumber} of ${totalPages} - Generated ${generatedAt}`
        }
      />
    </>
  );
}

function LabelValueBox({ title, rows }: { title: string; rows: Array<{ label: string; value: string }> }) {
  return (
    <View style={[styles.box, { width: '49%' }]}>
      <Text style={styles.sectionHeader}>{title}</Text>
      {rows.map((row) => (
        <View key={row.label} style={styles.row}>
          <Text style={styles.label}>{row.label}</Text>
          <Text style={styles.text}>{row.value}</Text>
        </View>
      ))}
    </View>
  );
}

function AnalysisReportPage({ data }: { data: AnalysisReportDocumentData }) {
  return (
    <Page size="A4" style={styles.page}>
      <Text style={styles.pageTitle}>
        {data.companyName} ({data.symbol})
      </Text>
      <Text style={styles.pageSubtitle}>Stock analysis - {data.periodLabel}</Text>

      <View style={styles.box}>
        <Text style={styles.label}>Recommendation</Text>
        <Text style={[styles.value, toneStyle(data.recommendationTone)]}>{data.recommendation}</Text>
      </View>

      <View style={[{ flexDirection: 'row', justifyContent: 'space-between' }]}>
        <LabelValueBox title="Technical Indicators" rows={data.indicatorRows} />
        <LabelValueBox title="News Coverage" rows={data.newsStatsRows} />
      </View>

      {data.predictionLines.length > 0 && (
        <View style={styles.box}>
          <Text style={styles.sectionHeader}>Price Predictions</Text>
          {data.predictionLines.map((line, index) => (
            <Text key={`${line}-${index}`} style={styles.text}>
              {line}
            </Text>
          ))}
        </View>
      )}

      {data.sections.map((section, index) => (
        <View key={`${section.title ?? 'intro'}-${index}`} style={styles.block} wrap>
          {section.title && <Text style={styles.sectionHeader}>{section.title}</Text>}
          {section.paragraphs.map((paragraph, paragraphIndex) => (
            <Text key={paragraphIndex} style={styles.text}>
              {paragraph}
            </Text>
          ))}
        </View>
      ))}

      <Footer generatedAt={data.generatedAt} />
    </Page>
  );
}

export function AnalysisReportDocument({ data }: { data: AnalysisReportDocumentData }) {
  return (
    <Document title={`Stock Analysis - ${data.symbol}`} author="Stock Trend Advisor">
      <AnalysisReportPage data={data} />
    </Document>
  );
}
