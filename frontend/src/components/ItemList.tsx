export function ItemList({ items }: { items: string[] }) {
  return (
    <div className="learning-items">
      <span className="section-title">Study items</span>
      {items.map((item, i) => (
        <div key={i} className="learning-item">
          {item}
        </div>
      ))}
    </div>
  );
}
